/**
 * FastEmbed provider using ONNX runtime with quantized BGE models.
 *
 * `fastembed` is an optional dependency: it is imported on first use, so the
 * single-vector backend can be constructed (and probed) without it.
 */

import path from 'node:path';
import type {FlagEmbedding} from 'fastembed';
import {getHomeDir} from '../lib/constants.js';
import type {Logger} from '../lib/logger.js';
import type {EmbeddingProvider, ModelProgressCallback} from './types.js';

type FastEmbedModule = typeof import('fastembed');

/**
 * Model names accepted in config, mapped to FastEmbed's enum keys.
 */
const MODEL_KEYS = {
	'bge-small-en-v1.5': 'BGESmallENV15',
	'bge-base-en-v1.5': 'BGEBaseENV15',
	'all-MiniLM-L6-v2': 'AllMiniLML6V2',
} as const;

type SupportedModel = keyof typeof MODEL_KEYS;

function isSupportedModel(model: string): model is SupportedModel {
	return model in MODEL_KEYS;
}

export class FastEmbedProvider implements EmbeddingProvider {
	readonly model: string;
	private readonly logger: Logger | undefined;
	private embedder: FlagEmbedding | null = null;
	private initPromise: Promise<FlagEmbedding> | null = null;

	constructor(model: string, logger?: Logger) {
		if (!isSupportedModel(model)) {
			throw new Error(
				`Unsupported local embedding model "${model}". Choose one of: ${Object.keys(MODEL_KEYS).join(', ')}`,
			);
		}
		this.model = model;
		this.logger = logger;
	}

	async initialize(onProgress?: ModelProgressCallback): Promise<void> {
		await this.getEmbedder(onProgress);
	}

	private getEmbedder(onProgress?: ModelProgressCallback): Promise<FlagEmbedding> {
		if (this.embedder) return Promise.resolve(this.embedder);
		if (!this.initPromise) {
			this.initPromise = this.load(onProgress).catch(error => {
				this.initPromise = null;
				throw error;
			});
		}
		return this.initPromise;
	}

	private async load(onProgress?: ModelProgressCallback): Promise<FlagEmbedding> {
		const startTime = Date.now();
		onProgress?.('loading', undefined, this.model);

		const fastembed: FastEmbedModule = await import('fastembed');
		const key = isSupportedModel(this.model) ? MODEL_KEYS[this.model] : 'BGESmallENV15';
		const embedder = await fastembed.FlagEmbedding.init({
			model: fastembed.EmbeddingModel[key],
			cacheDir: path.join(getHomeDir(), 'models'),
			showDownloadProgress: false,
		});

		this.logger?.info('FastEmbedProvider', 'Model loaded', {
			model: this.model,
			elapsedMs: Date.now() - startTime,
		});
		onProgress?.('ready');
		this.embedder = embedder;
		return embedder;
	}

	/**
	 * FastEmbed batches internally via an async generator.
	 */
	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const embedder = await this.getEmbedder();
		const results: number[][] = [];
		for await (const batch of embedder.embed(texts)) {
			results.push(...batch.map(vector => Array.from(vector)));
		}
		return results;
	}

	async embedQuery(text: string): Promise<number[]> {
		const embedder = await this.getEmbedder();
		return Array.from(await embedder.queryEmbed(text));
	}

	close(): void {
		this.embedder = null;
		this.initPromise = null;
	}
}
