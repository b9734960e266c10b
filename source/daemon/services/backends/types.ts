/**
 * Backend protocol shared by the single-vector and multi-vector indexes.
 *
 * Backends are selected once by the factory; nothing downstream branches on
 * the concrete class.
 */

import type {Logger} from '../../lib/logger.js';
import type {CodeUnit, SearchResult} from '../types.js';

export const BACKEND_KINDS = ['single-vector', 'multi-vector'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export type BackendRequest = BackendKind | 'auto';

export function isBackendKind(value: string): value is BackendKind {
	return (BACKEND_KINDS as readonly string[]).includes(value);
}

/**
 * Result of a build() call.
 * Invariant: new + updated + unchanged === number of units passed in.
 */
export interface BackendStats {
	new: number;
	updated: number;
	unchanged: number;
	/** Previously indexed units absent from this build */
	deleted: number;
	embedModel: string;
	backend: BackendKind;
	/** Thresholds overrode an incremental request */
	forcedRebuild: boolean;
	/** Every unit was re-embedded */
	fullRebuild: boolean;
}

/**
 * Read-only projection of an index's state.
 */
export interface BackendInfo {
	backend: BackendKind;
	embedModel: string;
	/** Vector width; null when nothing is loaded */
	dimension: number | null;
	count: number;
	indexPath: string;
	extra: Record<string, unknown>;
}

/**
 * BM25 ranking used by the single-vector backend for rank fusion.
 */
export interface LexicalRanker {
	search(query: string, k: number): Promise<Array<{id: string; score: number}>>;
}

export interface SearchBackend {
	readonly kind: BackendKind;

	/**
	 * Index `units`; `texts[i]` is the embeddable text of `units[i]`.
	 * Unless `rebuild`, only units whose fileHash changed are re-embedded.
	 * Metadata is persisted by save(), not here.
	 */
	build(units: CodeUnit[], texts: string[], rebuild?: boolean): Promise<BackendStats>;

	/**
	 * At most `k` results, best first. Empty when nothing is loaded.
	 */
	search(query: string, k: number): Promise<SearchResult[]>;

	/**
	 * Read the persisted index. False (never a throw) when absent, corrupt,
	 * mismatched, or mid-build.
	 */
	load(): Promise<boolean>;

	/**
	 * Persist the built state: top-level meta first, then backend meta.
	 */
	save(): Promise<void>;

	info(): BackendInfo;

	/**
	 * Units whose name is `name` or ends in `.name`; null when no index is
	 * loaded.
	 */
	lookupByName(name: string): CodeUnit[] | null;

	/** Build id of the loaded snapshot, or null. */
	loadedBuildId(): string | null;

	close(): Promise<void>;
}

/**
 * Construction options common to both backends.
 */
export interface BackendBaseOptions {
	/** Root index directory (holds the top-level meta.json) */
	indexDir: string;
	logger: Logger;
}
