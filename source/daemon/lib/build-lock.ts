/**
 * Build serialization for one backend index directory.
 *
 * Combines a proper-lockfile lock (process-level exclusion, scoped to the
 * backend's own directory) with the `.build_in_progress` sentinel that marks
 * an unfinished build on disk.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import {INDEX_LAYOUT} from './constants.js';
import {BuildInProgressError} from './errors.js';
import type {Logger} from './logger.js';

/** Lock is stale after 30s without an mtime refresh */
const STALE_MS = 30_000;
/** Refresh the lock mtime every 10s to prove liveness */
const UPDATE_MS = 10_000;

export class BuildGuard {
	readonly dir: string;
	private readonly logger: Logger;
	private release: (() => Promise<void>) | null = null;

	constructor(dir: string, logger: Logger) {
		this.dir = dir;
		this.logger = logger;
	}

	get lockPath(): string {
		return path.join(this.dir, INDEX_LAYOUT.LOCK_FILE);
	}

	get sentinelPath(): string {
		return path.join(this.dir, INDEX_LAYOUT.SENTINEL_FILE);
	}

	/** True while this instance holds the directory lock. */
	get held(): boolean {
		return this.release !== null;
	}

	/**
	 * Take the exclusive build lock. Reentrant for the holder; fails fast with
	 * BuildInProgressError when another holder has it.
	 */
	async acquire(): Promise<void> {
		if (this.release) return;

		await fs.mkdir(this.dir, {recursive: true});
		try {
			this.release = await lockfile.lock(this.dir, {
				lockfilePath: this.lockPath,
				stale: STALE_MS,
				update: UPDATE_MS,
				retries: 0,
				onCompromised: err => {
					this.logger.error('BuildGuard', `Build lock compromised for ${this.dir}`, err);
					this.release = null;
				},
			});
		} catch (err) {
			if (err instanceof Error && 'code' in err && err.code === 'ELOCKED') {
				throw new BuildInProgressError(this.dir);
			}
			throw err;
		}
	}

	async releaseLock(): Promise<void> {
		const release = this.release;
		if (!release) return;
		this.release = null;
		try {
			await release();
		} catch (err) {
			// Already released (e.g. compromised); nothing left to undo
			this.logger.warn('BuildGuard', 'Failed to release build lock', {
				dir: this.dir,
				error: err instanceof Error ? err.message : String(err),
			});
		}
	}

	/**
	 * Whether some other holder (another process, or another guard in this
	 * process) currently owns the lock.
	 */
	async isLockedElsewhere(): Promise<boolean> {
		if (this.release) return false;
		try {
			return await lockfile.check(this.dir, {
				lockfilePath: this.lockPath,
				stale: STALE_MS,
			});
		} catch {
			// Directory missing: nobody can hold it
			return false;
		}
	}

	async markInProgress(): Promise<void> {
		await fs.mkdir(this.dir, {recursive: true});
		await fs.writeFile(
			this.sentinelPath,
			JSON.stringify({pid: process.pid, started_at: new Date().toISOString()}) +
				'\n',
		);
	}

	async clearInProgress(): Promise<void> {
		await fs.rm(this.sentinelPath, {force: true});
	}

	async hasSentinel(): Promise<boolean> {
		try {
			await fs.access(this.sentinelPath);
			return true;
		} catch {
			return false;
		}
	}
}
