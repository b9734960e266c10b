/**
 * Service Types - Unit model, search results, and event interfaces.
 *
 * Services emit events; the daemon owner and the CLI subscribe to them.
 */

import {EventEmitter} from 'node:events';

// ============================================================================
// Unit Model
// ============================================================================

export type UnitKind = 'function' | 'class' | 'method' | 'module';

/**
 * One indexable code entity.
 */
export interface CodeUnit {
	/** Stable id derived from file path + qualified name */
	id: string;
	/** Qualified name (methods are `Class.method`) */
	name: string;
	kind: UnitKind;
	language: string;
	/** Project-relative path with `/` separators */
	filePath: string;
	/** 1-based, inclusive */
	startLine: number;
	endLine: number;
	signature: string;
	docstringSummary: string;
	/** Content hash of the source file at index time */
	fileHash: string;
}

/**
 * One ranked retrieval hit. Scores are only comparable within one backend.
 */
export interface SearchResult {
	unitId: string;
	score: number;
	name: string;
	kind: UnitKind;
	filePath: string;
	line: number;
	signature: string;
}

export function toSearchResult(unit: CodeUnit, score: number): SearchResult {
	return {
		unitId: unit.id,
		score,
		name: unit.name,
		kind: unit.kind,
		filePath: unit.filePath,
		line: unit.startLine,
		signature: unit.signature,
	};
}

// ============================================================================
// Index Stats
// ============================================================================

/**
 * Statistics returned from an end-to-end index build.
 */
export interface IndexStats {
	backend: string;
	embedModel: string;
	totalFiles: number;
	totalUnits: number;
	new: number;
	updated: number;
	unchanged: number;
	deleted: number;
	fullRebuild: boolean;
	forcedRebuild: boolean;
	durationMs: number;
}

// ============================================================================
// Indexing Events
// ============================================================================

/**
 * Indexing phases for structured progress updates.
 */
export type IndexingPhase = 'scan' | 'extract' | 'embed' | 'persist' | 'lexical';

export interface IndexingEvents {
	start: [];

	progress: [
		data: {
			phase: IndexingPhase;
			current: number;
			total: number;
			stage: string;
		},
	];

	complete: [data: {stats: IndexStats}];

	error: [data: {error: Error}];
}

// ============================================================================
// Typed Event Emitter
// ============================================================================

/**
 * Type-safe event emitter for services.
 *
 * ```typescript
 * const service = new IndexingService(projectRoot);
 * service.on('progress', ({current, total, stage}) => {
 *   console.log(`${current}/${total}: ${stage}`);
 * });
 * ```
 */
export class TypedEmitter<
	T extends {[K in keyof T]: unknown[]},
> extends EventEmitter {
	override emit<K extends keyof T & string>(event: K, ...args: T[K]): boolean {
		return super.emit(event, ...args);
	}

	override on<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.on(event, listener as (...args: unknown[]) => void);
	}

	override once<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.once(event, listener as (...args: unknown[]) => void);
	}

	override off<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.off(event, listener as (...args: unknown[]) => void);
	}
}
