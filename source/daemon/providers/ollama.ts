/**
 * Ollama embedding provider.
 *
 * Talks to a local Ollama server via POST /api/embed, which accepts a batch
 * of inputs and returns one embedding per input.
 */

import type {Logger} from '../lib/logger.js';
import type {EmbeddingProvider, ModelProgressCallback} from './types.js';
import {
	assertOk,
	chunk,
	processBatchesWithLimit,
	withRetry,
} from './api-utils.js';

const BATCH_SIZE = 32;
// A local server; more parallel requests only queue inside Ollama
const OLLAMA_CONCURRENCY = 2;

export interface OllamaProviderOptions {
	host: string;
	model: string;
	logger?: Logger;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
	readonly model: string;
	private readonly host: string;
	private readonly logger: Logger | undefined;
	private initialized = false;

	constructor(options: OllamaProviderOptions) {
		this.host = options.host.replace(/\/+$/, '');
		this.model = options.model;
		this.logger = options.logger;
	}

	/**
	 * Verify the server is reachable and the model is pulled.
	 */
	async initialize(onProgress?: ModelProgressCallback): Promise<void> {
		if (this.initialized) return;
		onProgress?.('loading', undefined, `Checking ${this.model} on ${this.host}`);

		let response: Response;
		try {
			response = await fetch(`${this.host}/api/tags`);
		} catch (error) {
			throw new Error(
				`Cannot reach Ollama at ${this.host}. Start it with \`ollama serve\`. (${error instanceof Error ? error.message : String(error)})`,
			);
		}
		await assertOk(response, 'Ollama');

		const tags = (await response.json()) as {models?: Array<{name: string}>};
		const names = (tags.models ?? []).map(m => m.name);
		const pulled = names.some(
			name => name === this.model || name === `${this.model}:latest`,
		);
		if (!pulled) {
			throw new Error(
				`Ollama model ${this.model} is not available. Run: ollama pull ${this.model}`,
			);
		}

		this.initialized = true;
		onProgress?.('ready');
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (!this.initialized) {
			await this.initialize();
		}

		if (texts.length === 0) {
			return [];
		}

		return processBatchesWithLimit(
			chunk(texts, BATCH_SIZE),
			(batch, index) =>
				withRetry(() => this.embedBatch(batch), {
					logger: this.logger,
					label: `ollama batch ${index + 1}`,
				}),
			OLLAMA_CONCURRENCY,
		);
	}

	private async embedBatch(texts: string[]): Promise<number[][]> {
		const response = await fetch(`${this.host}/api/embed`, {
			method: 'POST',
			headers: {'Content-Type': 'application/json'},
			body: JSON.stringify({model: this.model, input: texts}),
		});

		await assertOk(response, 'Ollama');

		const data = (await response.json()) as {embeddings?: number[][]};
		return data.embeddings ?? [];
	}

	async embedQuery(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new Error('Ollama embedding failed');
		}
		return vector;
	}

	close(): void {
		this.initialized = false;
	}
}
