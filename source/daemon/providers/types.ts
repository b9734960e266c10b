/**
 * Embedding Provider Types.
 *
 * Two capabilities sit behind the backends:
 * - EmbeddingProvider: text -> one dense vector (single-vector backend)
 * - TokenEncoder: text -> one vector per token (multi-vector backend)
 */

/**
 * Progress callback for model loading/downloading.
 */
export type ModelProgressCallback = (
	status: 'downloading' | 'loading' | 'ready',
	progress?: number,
	message?: string,
) => void;

/**
 * Dense embedding provider.
 */
export interface EmbeddingProvider {
	/** Model identifier recorded in index metadata */
	readonly model: string;

	/**
	 * Load the model or validate credentials. Idempotent.
	 */
	initialize(onProgress?: ModelProgressCallback): Promise<void>;

	/**
	 * Embed a batch of documents. Returns one vector per input text, in order.
	 */
	embed(texts: string[]): Promise<number[][]>;

	/**
	 * Embed a search query. Some models use a query-specific prompt.
	 */
	embedQuery(text: string): Promise<number[]>;

	close(): void;
}

/**
 * Per-token encoder for late-interaction retrieval.
 * Returned token vectors are L2-normalised.
 */
export interface TokenEncoder {
	readonly model: string;

	initialize(onProgress?: ModelProgressCallback): Promise<void>;

	/** One token matrix per document, in input order */
	encodeDocuments(texts: string[]): Promise<Float32Array[][]>;

	encodeQuery(text: string): Promise<Float32Array[]>;

	close(): void;
}
