/**
 * OpenAI embedding provider.
 *
 * Supports regional endpoints for corporate accounts with data residency:
 * - Default: https://api.openai.com/v1
 * - US: https://us.api.openai.com/v1
 * - EU: https://eu.api.openai.com/v1
 */

import type {Logger} from '../lib/logger.js';
import type {EmbeddingProvider, ModelProgressCallback} from './types.js';
import {
	assertOk,
	chunk,
	processBatchesWithLimit,
	withRetry,
} from './api-utils.js';

const DEFAULT_API_BASE = 'https://api.openai.com/v1';
// OpenAI allows 2,048 inputs per request; units are short, so 64 keeps
// requests small without many round trips.
const BATCH_SIZE = 64;

export interface OpenAIProviderOptions {
	apiKey?: string;
	baseUrl?: string;
	model: string;
	logger?: Logger;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly model: string;
	private readonly apiKey: string;
	private readonly apiBase: string;
	private readonly logger: Logger | undefined;
	private initialized = false;

	constructor(options: OpenAIProviderOptions) {
		// Trim the key to remove any accidental whitespace
		this.apiKey = (options.apiKey ?? '').trim();
		this.apiBase = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');
		this.model = options.model;
		this.logger = options.logger;
	}

	async initialize(_onProgress?: ModelProgressCallback): Promise<void> {
		if (!this.apiKey) {
			throw new Error(
				'OpenAI API key required. Set OPENAI_API_KEY in the environment.',
			);
		}
		this.initialized = true;
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (!this.initialized) {
			await this.initialize();
		}

		if (texts.length === 0) {
			return [];
		}

		return processBatchesWithLimit(chunk(texts, BATCH_SIZE), (batch, index) =>
			withRetry(() => this.embedBatch(batch), {
				logger: this.logger,
				label: `openai batch ${index + 1}`,
			}),
		);
	}

	private async embedBatch(texts: string[]): Promise<number[][]> {
		const response = await fetch(`${this.apiBase}/embeddings`, {
			method: 'POST',
			headers: {
				'Content-Type': 'application/json',
				Authorization: `Bearer ${this.apiKey}`,
			},
			body: JSON.stringify({
				model: this.model,
				input: texts,
			}),
		});

		await assertOk(response, 'OpenAI');

		const data = (await response.json()) as {
			data: Array<{embedding: number[]; index: number}>;
		};

		// Sort by index to ensure correct order
		return data.data.sort((a, b) => a.index - b.index).map(d => d.embedding);
	}

	async embedQuery(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new Error('OpenAI embedding failed');
		}
		return vector;
	}

	close(): void {
		this.initialized = false;
	}
}
