/**
 * On-disk layout of the multi-vector backend:
 *   plaid/meta.json                build metadata, counters, unit records
 *   plaid/index/                   active index
 *   plaid/index-build-<pid>-<ts>/  full rebuild in progress
 *   plaid/index-old/               previous index during the swap
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {readJsonFile, writeJsonAtomic, type JsonReadResult} from '../../../lib/atomic.js';
import {INDEX_LAYOUT} from '../../../lib/constants.js';
import type {Logger} from '../../../lib/logger.js';
import {persistedUnitSchema} from '../metadata.js';

export const multiVectorMetaSchema = z.object({
	build_id: z.string(),
	embed_model: z.string(),
	dimension: z.number().int().nonnegative(),
	count: z.number().int().nonnegative(),
	pool_factor: z.number().int().min(1),
	incremental_updates: z.number().int().nonnegative(),
	deleted_since_rebuild: z.number().int().nonnegative(),
	units_at_last_rebuild: z.number().int().nonnegative(),
	units: z.array(persistedUnitSchema),
});

export type MultiVectorMeta = z.infer<typeof multiVectorMetaSchema>;

export class MultiVectorStore {
	readonly dir: string;
	private readonly logger: Logger;

	constructor(dir: string, logger: Logger) {
		this.dir = dir;
		this.logger = logger;
	}

	get metaPath(): string {
		return path.join(this.dir, INDEX_LAYOUT.META_FILE);
	}

	get activeDir(): string {
		return path.join(this.dir, INDEX_LAYOUT.PLAID_ACTIVE_DIR);
	}

	get oldDir(): string {
		return path.join(this.dir, INDEX_LAYOUT.PLAID_OLD_DIR);
	}

	newBuildDir(): string {
		return path.join(
			this.dir,
			`${INDEX_LAYOUT.PLAID_BUILD_PREFIX}${process.pid}-${Date.now()}`,
		);
	}

	readMeta(): Promise<JsonReadResult<MultiVectorMeta>> {
		return readJsonFile(this.metaPath, multiVectorMetaSchema);
	}

	async writeMeta(meta: MultiVectorMeta): Promise<void> {
		await writeJsonAtomic(this.metaPath, meta);
	}

	/**
	 * Move a freshly built index into place. If the second rename fails the
	 * previous index is restored. Old and temp dirs are removed either way.
	 */
	async swapIn(buildDir: string): Promise<void> {
		const active = this.activeDir;
		const old = this.oldDir;
		try {
			await fs.rm(old, {recursive: true, force: true});
			let hadActive = true;
			try {
				await fs.rename(active, old);
			} catch (error) {
				if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
					throw error;
				}
				hadActive = false;
			}

			try {
				await fs.rename(buildDir, active);
			} catch (error) {
				if (hadActive) {
					await fs.rename(old, active);
				}
				throw error;
			}
		} finally {
			await fs.rm(old, {recursive: true, force: true});
			await fs.rm(buildDir, {recursive: true, force: true});
		}
	}

	/**
	 * Remove temp and scratch directories left by an interrupted rebuild.
	 */
	async removeBuildLeftovers(): Promise<string[]> {
		let entries: string[];
		try {
			entries = await fs.readdir(this.dir);
		} catch {
			return [];
		}
		// Interrupted between the two renames: the old index is the live one
		if (
			entries.includes(INDEX_LAYOUT.PLAID_OLD_DIR) &&
			!entries.includes(INDEX_LAYOUT.PLAID_ACTIVE_DIR)
		) {
			await fs.rename(this.oldDir, this.activeDir);
			this.logger.warn('MultiVectorStore', 'Restored previous index after an interrupted swap');
			entries = entries.filter(name => name !== INDEX_LAYOUT.PLAID_OLD_DIR);
		}
		const leftovers = entries.filter(
			name =>
				name === INDEX_LAYOUT.PLAID_OLD_DIR ||
				name.startsWith(INDEX_LAYOUT.PLAID_BUILD_PREFIX),
		);
		for (const name of leftovers) {
			await fs.rm(path.join(this.dir, name), {recursive: true, force: true});
		}
		if (leftovers.length > 0) {
			this.logger.info('MultiVectorStore', 'Removed build leftovers', {leftovers});
		}
		return leftovers;
	}
}
