/**
 * Daemon State - Simple observable state.
 *
 * Single source of truth for the daemon session's indexing progress.
 * Clients poll via the status() RPC to read it.
 */

import type {IndexingPhase, IndexStats} from './services/types.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type IndexingStatus = 'idle' | 'indexing' | 'complete' | 'error';

export interface IndexingState {
	status: IndexingStatus;
	phase: IndexingPhase | null;
	current: number;
	total: number;
	stage: string;
	error: string | null;
	lastCompleted: string | null;
	lastStats: IndexStats | null;
}

export interface DaemonState {
	indexing: IndexingState;
}

function createInitialState(): DaemonState {
	return {
		indexing: {
			status: 'idle',
			phase: null,
			current: 0,
			total: 0,
			stage: '',
			error: null,
			lastCompleted: null,
			lastStats: null,
		},
	};
}

// ============================================================================
// State Container
// ============================================================================

export type StateListener = (state: DaemonState) => void;

/**
 * State container with optional change listeners.
 *
 * ```typescript
 * state.updateNested('indexing', () => ({status: 'indexing', current: 5}));
 * const snapshot = state.getSnapshot();
 * ```
 */
export class StateContainer {
	private state: DaemonState = createInitialState();
	private listeners: Set<StateListener> = new Set();

	getSnapshot(): DaemonState {
		return this.state;
	}

	/**
	 * Merge a partial update into one top-level section.
	 */
	updateNested<K extends keyof DaemonState>(
		key: K,
		updater: (value: DaemonState[K]) => Partial<DaemonState[K]>,
	): void {
		const current = this.state[key];
		this.state = {
			...this.state,
			[key]: {...current, ...updater(current)},
		};
		this.notifyListeners();
	}

	/**
	 * Subscribe to state changes. Returns an unsubscribe function.
	 */
	subscribe(listener: StateListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	reset(): void {
		this.state = createInitialState();
		this.notifyListeners();
	}

	private notifyListeners(): void {
		for (const listener of this.listeners) {
			listener(this.state);
		}
	}
}
