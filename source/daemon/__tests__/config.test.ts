import fs from 'node:fs/promises';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {
	DEFAULT_CONFIG,
	DEFAULT_MULTI_VECTOR_CONFIG,
	loadConfig,
	mergeConfig,
	saveConfig,
} from '../lib/config.js';
import {getConfigPath} from '../lib/constants.js';
import {createTempDir, type TestContext} from './helpers.js';

describe('config', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await createTempDir();
	});

	afterEach(async () => {
		await fs.rm(path.dirname(getConfigPath(ctx.dir)), {recursive: true, force: true});
		await ctx.cleanup();
	});

	async function writeRawConfig(content: string): Promise<void> {
		const configPath = getConfigPath(ctx.dir);
		await fs.mkdir(path.dirname(configPath), {recursive: true});
		await fs.writeFile(configPath, content);
	}

	it('returns defaults when no config exists', async () => {
		expect(await loadConfig(ctx.dir)).toEqual(DEFAULT_CONFIG);
	});

	it('round-trips a saved config', async () => {
		const config = {
			...DEFAULT_CONFIG,
			backend: 'single-vector' as const,
			extensions: ['.py'],
			multiVector: {...DEFAULT_MULTI_VECTOR_CONFIG, nprobe: 8},
		};
		await saveConfig(ctx.dir, config);
		expect(await loadConfig(ctx.dir)).toEqual(config);
	});

	it('merges partial multi-vector settings over the defaults', async () => {
		await writeRawConfig(JSON.stringify({multiVector: {maxIncrementalUpdates: 5}}));
		const config = await loadConfig(ctx.dir);
		expect(config.multiVector).toEqual({
			...DEFAULT_MULTI_VECTOR_CONFIG,
			maxIncrementalUpdates: 5,
		});
	});

	it('picks the provider default model when switching providers', () => {
		expect(mergeConfig({embeddingProvider: 'openai'}).embeddingModel).toBe(
			'text-embedding-3-small',
		);
		expect(
			mergeConfig({embeddingProvider: 'ollama', embeddingModel: 'custom'}).embeddingModel,
		).toBe('custom');
	});

	it('throws on malformed JSON', async () => {
		await writeRawConfig('{not json');
		await expect(loadConfig(ctx.dir)).rejects.toThrow('Invalid config.json at');
	});

	it('throws on values that fail validation', async () => {
		await writeRawConfig(JSON.stringify({multiVector: {rebuildDeletionRatio: 2}}));
		await expect(loadConfig(ctx.dir)).rejects.toThrow('multiVector.rebuildDeletionRatio');
	});
});
