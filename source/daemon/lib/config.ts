/**
 * Config - Project configuration loading and management.
 *
 * Configuration is stored globally per-project under the codeloupe home dir
 * (default: ~/.local/share/codeloupe, override via $CODELOUPE_HOME).
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {getConfigPath} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type EmbeddingProviderType = 'local' | 'ollama' | 'openai';

export type BackendPreference = 'auto' | 'single-vector' | 'multi-vector';

/**
 * Tunables for the multi-vector (late-interaction) backend.
 */
export interface MultiVectorConfig {
	/** Token encoder model id */
	model: string;
	/** Document token pooling factor (1 disables pooling) */
	poolFactor: number;
	/** Centroids probed per query token */
	nprobe: number;
	/** Cumulative deleted / units-at-last-rebuild ratio that forces a full rebuild */
	rebuildDeletionRatio: number;
	/** Incremental updates since the last full rebuild that force a full rebuild */
	maxIncrementalUpdates: number;
	/** Incremental updates after which each build logs a warning */
	warnIncrementalUpdates: number;
}

export interface CodeloupeConfig {
	version: number;
	backend: BackendPreference;
	embeddingProvider: EmbeddingProviderType;
	/** Dense embedding model for the single-vector backend */
	embeddingModel: string;
	ollamaHost: string;
	/** OpenAI API base URL (for corporate accounts with data residency) */
	openaiBaseUrl?: string;
	/** Extensions to index. Empty = every extension the extractor understands. */
	extensions: string[];
	multiVector: MultiVectorConfig;
	/** Wall-clock budget for a daemon request */
	requestTimeoutMs: number;
}

// ============================================================================
// Provider Configurations
// ============================================================================

export const PROVIDER_CONFIGS: Record<
	EmbeddingProviderType,
	{model: string; dimensions: number}
> = {
	local: {
		model: 'bge-small-en-v1.5',
		dimensions: 384,
	},
	ollama: {
		model: 'nomic-embed-text',
		dimensions: 768,
	},
	openai: {
		model: 'text-embedding-3-small',
		dimensions: 1536,
	},
};

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MULTI_VECTOR_CONFIG: MultiVectorConfig = {
	model: 'answerdotai/answerai-colbert-small-v1',
	poolFactor: 2,
	nprobe: 4,
	rebuildDeletionRatio: 0.2,
	maxIncrementalUpdates: 50,
	warnIncrementalUpdates: 20,
};

export const DEFAULT_CONFIG: CodeloupeConfig = {
	version: 1,
	backend: 'auto',
	embeddingProvider: 'local',
	embeddingModel: PROVIDER_CONFIGS['local'].model,
	ollamaHost: 'http://localhost:11434',
	extensions: [],
	multiVector: DEFAULT_MULTI_VECTOR_CONFIG,
	requestTimeoutMs: 120_000,
};

// ============================================================================
// Validation
// ============================================================================

const multiVectorSchema = z
	.object({
		model: z.string().min(1),
		poolFactor: z.number().int().min(1),
		nprobe: z.number().int().min(1),
		rebuildDeletionRatio: z.number().gt(0).max(1),
		maxIncrementalUpdates: z.number().int().min(1),
		warnIncrementalUpdates: z.number().int().min(1),
	})
	.partial();

const configFileSchema = z
	.object({
		version: z.number().int(),
		backend: z.enum(['auto', 'single-vector', 'multi-vector']),
		embeddingProvider: z.enum(['local', 'ollama', 'openai']),
		embeddingModel: z.string().min(1),
		ollamaHost: z.string().url(),
		openaiBaseUrl: z.string().url(),
		extensions: z.array(z.string()),
		multiVector: multiVectorSchema,
		requestTimeoutMs: z.number().int().positive(),
	})
	.partial();

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Load config from disk, merging with defaults.
 * Returns DEFAULT_CONFIG if no config file exists.
 *
 * If the config file exists but can't be parsed or validated, this throws
 * instead of silently falling back to defaults: a silent provider switch
 * would make the existing index unloadable.
 */
export async function loadConfig(projectRoot: string): Promise<CodeloupeConfig> {
	const configPath = getConfigPath(projectRoot);

	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch {
		// Config doesn't exist - return defaults (expected for first run)
		return {...DEFAULT_CONFIG, multiVector: {...DEFAULT_MULTI_VECTOR_CONFIG}};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (parseError) {
		throw new Error(
			`Invalid config.json at ${configPath}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
		);
	}

	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		throw new Error(
			`Invalid config.json at ${configPath}: ${parsed.error.issues
				.map(issue => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ')}`,
		);
	}

	return mergeConfig(parsed.data);
}

/**
 * Overlay a partial config on the defaults.
 *
 * Switching providers without naming a model picks that provider's default
 * model rather than keeping the previous provider's.
 */
export function mergeConfig(
	loaded: z.infer<typeof configFileSchema>,
): CodeloupeConfig {
	const provider = loaded.embeddingProvider ?? DEFAULT_CONFIG.embeddingProvider;
	return {
		...DEFAULT_CONFIG,
		...loaded,
		embeddingProvider: provider,
		embeddingModel: loaded.embeddingModel ?? PROVIDER_CONFIGS[provider].model,
		multiVector: {...DEFAULT_MULTI_VECTOR_CONFIG, ...(loaded.multiVector ?? {})},
	};
}

/**
 * Save config to disk, creating the per-project directory if needed.
 */
export async function saveConfig(
	projectRoot: string,
	config: CodeloupeConfig,
): Promise<void> {
	const configPath = getConfigPath(projectRoot);
	await fs.mkdir(path.dirname(configPath), {recursive: true});
	await fs.writeFile(configPath, JSON.stringify(config, null, '\t') + '\n');
}
