/**
 * Error taxonomy for the search engine.
 *
 * Only DependencyMissingError and InvalidBackendError are meant to surface as
 * hard failures; the rest describe index states the caller can recover from
 * by retrying or rebuilding.
 */

export type SearchErrorCode =
	| 'DEPENDENCY_MISSING'
	| 'INVALID_ARGUMENT'
	| 'BUILD_IN_PROGRESS'
	| 'EMBEDDING_MISMATCH'
	| 'INDEX_NOT_FOUND'
	| 'TIMEOUT';

export abstract class SearchError extends Error {
	abstract readonly code: SearchErrorCode;
	readonly retryable: boolean = false;
}

/**
 * A backend's optional library is not installed.
 */
export class DependencyMissingError extends SearchError {
	readonly code = 'DEPENDENCY_MISSING';
	readonly packages: string[];
	readonly installCommand: string;

	constructor(what: string, packages: string[]) {
		const installCommand = `npm install ${packages.join(' ')}`;
		super(`${what} requires ${packages.join(', ')}. Install with: ${installCommand}`);
		this.name = 'DependencyMissingError';
		this.packages = packages;
		this.installCommand = installCommand;
	}
}

/**
 * Malformed input: mismatched units/texts, duplicate ids, bad parameters.
 */
export class InvalidArgumentError extends SearchError {
	readonly code = 'INVALID_ARGUMENT';

	constructor(message: string) {
		super(message);
		this.name = 'InvalidArgumentError';
	}
}

/**
 * Unknown backend name.
 */
export class InvalidBackendError extends InvalidArgumentError {
	readonly requested: string;

	constructor(requested: string, valid: readonly string[]) {
		super(`Unknown backend "${requested}". Valid backends: ${valid.join(', ')}`);
		this.name = 'InvalidBackendError';
		this.requested = requested;
	}
}

/**
 * Another build holds the backend directory's lock.
 */
export class BuildInProgressError extends SearchError {
	readonly code = 'BUILD_IN_PROGRESS';
	override readonly retryable = true;
	readonly indexDir: string;

	constructor(indexDir: string) {
		super(`An index build is already in progress for ${indexDir}. Retry once it finishes.`);
		this.name = 'BuildInProgressError';
		this.indexDir = indexDir;
	}
}

/**
 * An encoder returned a different number of embeddings than texts requested.
 */
export class EmbeddingMismatchError extends SearchError {
	readonly code = 'EMBEDDING_MISMATCH';
	readonly expected: number;
	readonly actual: number;

	constructor(expected: number, actual: number) {
		super(
			`Embedding count mismatch: requested ${expected}, received ${actual}. Build aborted.`,
		);
		this.name = 'EmbeddingMismatchError';
		this.expected = expected;
		this.actual = actual;
	}
}

export class IndexNotFoundError extends SearchError {
	readonly code = 'INDEX_NOT_FOUND';

	constructor(message = 'No index found. Run `codeloupe index` first.') {
		super(message);
		this.name = 'IndexNotFoundError';
	}
}

export class TimeoutError extends SearchError {
	readonly code = 'TIMEOUT';

	constructor(operation: string, ms: number) {
		super(`${operation} timed out after ${ms}ms`);
		this.name = 'TimeoutError';
	}
}

export function isSearchError(error: unknown): error is SearchError {
	return error instanceof SearchError;
}
