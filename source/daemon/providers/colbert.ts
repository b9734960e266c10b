/**
 * Late-interaction token encoder via @huggingface/transformers (ONNX Runtime).
 *
 * Runs a feature-extraction pipeline without pooling and keeps every token's
 * hidden state, L2-normalised. Queries and documents get ColBERT-style
 * marker prefixes so the model can tell them apart.
 *
 * Loading takes seconds; the pipeline is created on first use and stays
 * resident for the lifetime of the encoder.
 */

import path from 'node:path';
import type {FeatureExtractionPipeline} from '@huggingface/transformers';
import {getHomeDir} from '../lib/constants.js';
import type {Logger} from '../lib/logger.js';
import {l2Normalize} from '../services/backends/vectors.js';
import type {ModelProgressCallback, TokenEncoder} from './types.js';

const QUERY_PREFIX = '[Q] ';
const DOCUMENT_PREFIX = '[D] ';
const MAX_DOCUMENT_TOKENS = 300;
const MAX_QUERY_TOKENS = 32;

export class ColbertTokenEncoder implements TokenEncoder {
	readonly model: string;
	private readonly logger: Logger | undefined;
	private extractor: FeatureExtractionPipeline | null = null;
	private initPromise: Promise<FeatureExtractionPipeline> | null = null;

	constructor(model: string, logger?: Logger) {
		this.model = model;
		this.logger = logger;
	}

	async initialize(onProgress?: ModelProgressCallback): Promise<void> {
		await this.getExtractor(onProgress);
	}

	private getExtractor(
		onProgress?: ModelProgressCallback,
	): Promise<FeatureExtractionPipeline> {
		if (this.extractor) return Promise.resolve(this.extractor);
		if (!this.initPromise) {
			this.initPromise = this.load(onProgress).catch(error => {
				this.initPromise = null;
				throw error;
			});
		}
		return this.initPromise;
	}

	private async load(
		onProgress?: ModelProgressCallback,
	): Promise<FeatureExtractionPipeline> {
		const startTime = Date.now();
		onProgress?.('loading', undefined, this.model);

		const transformers = await import('@huggingface/transformers');
		transformers.env.cacheDir = path.join(getHomeDir(), 'models');
		const extractor = await transformers.pipeline('feature-extraction', this.model, {
			dtype: 'q8',
		});

		this.logger?.info('ColbertTokenEncoder', 'Model loaded', {
			model: this.model,
			elapsedMs: Date.now() - startTime,
		});
		onProgress?.('ready');
		this.extractor = extractor;
		return extractor;
	}

	async encodeDocuments(texts: string[]): Promise<Float32Array[][]> {
		const extractor = await this.getExtractor();
		const results: Float32Array[][] = [];
		// One text per call keeps padding tokens out of the token matrices
		for (const text of texts) {
			results.push(
				await this.encode(extractor, DOCUMENT_PREFIX + text, MAX_DOCUMENT_TOKENS),
			);
		}
		return results;
	}

	async encodeQuery(text: string): Promise<Float32Array[]> {
		const extractor = await this.getExtractor();
		return this.encode(extractor, QUERY_PREFIX + text, MAX_QUERY_TOKENS);
	}

	private async encode(
		extractor: FeatureExtractionPipeline,
		text: string,
		maxTokens: number,
	): Promise<Float32Array[]> {
		const output = await extractor(text, {pooling: 'none', normalize: false});
		// dims: [batch=1, tokens, hidden]
		const [, tokenCount = 0, hidden = 0] = output.dims;
		const data = toNumbers(output.data);
		const tokens: Float32Array[] = [];
		const limit = Math.min(tokenCount, maxTokens);
		for (let t = 0; t < limit; t++) {
			tokens.push(l2Normalize(Float32Array.from(data.slice(t * hidden, (t + 1) * hidden))));
		}
		return tokens;
	}

	close(): void {
		this.extractor?.dispose().catch(error => {
			this.logger?.warn('ColbertTokenEncoder', 'Failed to dispose pipeline', {
				error: error instanceof Error ? error.message : String(error),
			});
		});
		this.extractor = null;
		this.initPromise = null;
	}
}

function toNumbers(data: unknown): number[] {
	if (Array.isArray(data)) {
		return data.map(v => Number(v));
	}
	if (data instanceof Float32Array || data instanceof Float64Array) {
		return Array.from(data);
	}
	if (data instanceof BigInt64Array) {
		return Array.from(data, v => Number(v));
	}
	throw new Error('Unexpected tensor data from token encoder');
}
