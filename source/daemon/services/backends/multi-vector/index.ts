/**
 * Multi-vector backend: per-token embeddings scored by late interaction
 * over a centroid-partitioned index.
 *
 * The index is append-only between full rebuilds. Deleted units leave the
 * unit map (so they are never returned) but their token vectors stay until
 * a rebuild, which is forced once deletions or incremental updates pile up.
 */

import crypto from 'node:crypto';
import path from 'node:path';
import {BuildGuard} from '../../../lib/build-lock.js';
import {
	DEFAULT_MULTI_VECTOR_CONFIG,
	type MultiVectorConfig,
} from '../../../lib/config.js';
import {INDEX_LAYOUT} from '../../../lib/constants.js';
import {EmbeddingMismatchError, IndexNotFoundError} from '../../../lib/errors.js';
import type {Logger} from '../../../lib/logger.js';
import {Mutex} from '../../../lib/mutex.js';
import type {TokenEncoder} from '../../../providers/types.js';
import {toSearchResult, type CodeUnit, type SearchResult} from '../../types.js';
import {
	checkBuildConsistency,
	findUnitsByName,
	partitionUnits,
	persistedToUnit,
	readTopLevelMeta,
	unitToPersisted,
	validateBuildInput,
	writeTopLevelMeta,
	type UnitPartition,
} from '../metadata.js';
import type {
	BackendBaseOptions,
	BackendInfo,
	BackendStats,
	SearchBackend,
} from '../types.js';
import {poolTokens} from './kmeans.js';
import {PlaidIndex, type PlaidDocument} from './plaid.js';
import {MultiVectorStore} from './store.js';

export type MultiVectorTuning = Omit<MultiVectorConfig, 'model'>;

export interface MultiVectorBackendOptions extends BackendBaseOptions {
	encoder: TokenEncoder;
	tuning?: Partial<MultiVectorTuning>;
}

interface Counters {
	readonly incrementalUpdates: number;
	readonly deletedSinceRebuild: number;
	readonly unitsAtLastRebuild: number;
}

interface Snapshot {
	readonly buildId: string;
	readonly embedModel: string;
	readonly dimension: number;
	readonly poolFactor: number;
	readonly index: PlaidIndex;
	readonly units: readonly CodeUnit[];
	readonly unitMap: ReadonlyMap<string, CodeUnit>;
	readonly counters: Counters;
	readonly saved: boolean;
}

const COMPONENT = 'MultiVectorBackend';

export class MultiVectorBackend implements SearchBackend {
	readonly kind = 'multi-vector' as const;
	private readonly indexDir: string;
	private readonly logger: Logger;
	private readonly encoder: TokenEncoder;
	private readonly tuning: MultiVectorTuning;
	private readonly store: MultiVectorStore;
	private readonly guard: BuildGuard;
	private readonly mutex = new Mutex();
	private snapshot: Snapshot | null = null;
	private encoderReady: Promise<TokenEncoder> | null = null;

	constructor(options: MultiVectorBackendOptions) {
		const dir = path.join(options.indexDir, INDEX_LAYOUT.MULTI_VECTOR_DIR);
		this.indexDir = options.indexDir;
		this.logger = options.logger;
		this.encoder = options.encoder;
		this.tuning = {
			poolFactor: options.tuning?.poolFactor ?? DEFAULT_MULTI_VECTOR_CONFIG.poolFactor,
			nprobe: options.tuning?.nprobe ?? DEFAULT_MULTI_VECTOR_CONFIG.nprobe,
			rebuildDeletionRatio:
				options.tuning?.rebuildDeletionRatio ??
				DEFAULT_MULTI_VECTOR_CONFIG.rebuildDeletionRatio,
			maxIncrementalUpdates:
				options.tuning?.maxIncrementalUpdates ??
				DEFAULT_MULTI_VECTOR_CONFIG.maxIncrementalUpdates,
			warnIncrementalUpdates:
				options.tuning?.warnIncrementalUpdates ??
				DEFAULT_MULTI_VECTOR_CONFIG.warnIncrementalUpdates,
		};
		this.store = new MultiVectorStore(dir, options.logger);
		this.guard = new BuildGuard(dir, options.logger);
	}

	// ============================================================
	// Build
	// ============================================================

	async build(
		units: CodeUnit[],
		texts: string[],
		rebuild = false,
	): Promise<BackendStats> {
		validateBuildInput(units, texts);

		return this.mutex.runExclusive(async () => {
			// Held on entry only between our own unsaved build and its save()
			const continuing = this.guard.held;
			await this.guard.acquire();
			const state = {touchedDisk: false};
			try {
				if (!continuing && (await this.guard.hasSentinel())) {
					this.logger.warn(COMPONENT, 'Discarding leftovers of an interrupted build', {
						dir: this.store.dir,
					});
					// The sentinel must survive a failed discard
					state.touchedDisk = true;
					await this.discardInterruptedBuild();
					state.touchedDisk = false;
				}
				const previous = rebuild ? null : await this.currentOrPersisted();
				await this.guard.markInProgress();
				const {snapshot, stats} = await this.assemble(units, texts, previous, state);
				this.snapshot = snapshot;
				return stats;
			} catch (error) {
				// Once the index dir changed, the sentinel stays for load() to clean up
				if (!state.touchedDisk) {
					await this.guard.clearInProgress();
				}
				await this.guard.releaseLock();
				throw error;
			}
		});
	}

	private async currentOrPersisted(): Promise<Snapshot | null> {
		if (this.snapshot) return this.snapshot;
		const persisted = await this.readPersisted();
		if (persisted) {
			this.snapshot = persisted;
		}
		return persisted;
	}

	/**
	 * Which threshold, if any, forces this build to be a full rebuild.
	 */
	private rebuildReason(
		counters: Counters,
		partition: UnitPartition,
	): string | null {
		const deleted = counters.deletedSinceRebuild + partition.deletedIds.length;
		const ratio =
			counters.unitsAtLastRebuild > 0 ? deleted / counters.unitsAtLastRebuild : 0;
		if (deleted > 0 && ratio >= this.tuning.rebuildDeletionRatio) {
			return `deleted ratio ${(ratio * 100).toFixed(1)}% >= ${(this.tuning.rebuildDeletionRatio * 100).toFixed(0)}%`;
		}
		const changes =
			partition.added.length + partition.changed.length + partition.deletedIds.length;
		if (changes > 0 && counters.incrementalUpdates >= this.tuning.maxIncrementalUpdates) {
			return `${counters.incrementalUpdates} incremental updates >= ${this.tuning.maxIncrementalUpdates}`;
		}
		return null;
	}

	private async assemble(
		units: CodeUnit[],
		texts: string[],
		previous: Snapshot | null,
		state: {touchedDisk: boolean},
	): Promise<{snapshot: Snapshot; stats: BackendStats}> {
		const partition = partitionUnits(units, previous?.unitMap ?? new Map());
		const baseStats = {
			new: previous ? partition.added.length : units.length,
			updated: previous ? partition.changed.length : 0,
			unchanged: previous ? partition.unchanged.length : 0,
			deleted: previous ? partition.deletedIds.length : 0,
			embedModel: this.encoder.model,
			backend: this.kind,
		};

		let forcedRebuild = false;
		let full = previous === null || previous.index.centroids.length === 0;
		if (previous && !full) {
			const reason = this.rebuildReason(previous.counters, partition);
			if (reason) {
				this.logger.info(COMPONENT, `Forcing full rebuild: ${reason}`);
				full = true;
				forcedRebuild = true;
			} else if (
				previous.counters.incrementalUpdates >= this.tuning.warnIncrementalUpdates
			) {
				this.logger.warn(
					COMPONENT,
					`Index has ${previous.counters.incrementalUpdates} incremental updates since the last full rebuild; consider rebuilding`,
				);
			}
		}

		let documents: PlaidDocument[] = [];
		if (!full && previous) {
			const changed = [...partition.added, ...partition.changed].sort((a, b) => a - b);
			documents = await this.encode(changed.map(i => units[i].id), changed.map(i => texts[i]));
			const width = documents.find(doc => doc.tokens.length > 0)?.tokens[0].length;
			if (width !== undefined && width !== previous.index.dimension) {
				this.logger.info(COMPONENT, 'Token dimension changed; rebuilding from scratch', {
					from: previous.index.dimension,
					to: width,
				});
				full = true;
			}
		}

		let index: PlaidIndex;
		let counters: Counters;
		if (full) {
			documents = await this.encode(units.map(unit => unit.id), texts);
			const dimension =
				documents.find(doc => doc.tokens.length > 0)?.tokens[0].length ?? 0;
			const buildDir = this.store.newBuildDir();
			state.touchedDisk = true;
			index = await PlaidIndex.create(buildDir, documents, dimension);
			await this.store.swapIn(buildDir);
			counters = {
				incrementalUpdates: 0,
				deletedSinceRebuild: 0,
				unitsAtLastRebuild: units.length,
			};
		} else if (previous) {
			const touched = documents.length > 0 || partition.deletedIds.length > 0;
			const generation = previous.counters.incrementalUpdates + 1;
			index = previous.index;
			if (documents.length > 0) {
				state.touchedDisk = true;
				index = await previous.index.addDocuments(
					this.store.activeDir,
					documents,
					generation,
				);
			}
			counters = touched
				? {
						incrementalUpdates: generation,
						deletedSinceRebuild:
							previous.counters.deletedSinceRebuild + partition.deletedIds.length,
						unitsAtLastRebuild: previous.counters.unitsAtLastRebuild,
				  }
				: previous.counters;
		} else {
			throw new Error('Incremental build without a previous index');
		}

		const unitMap = new Map<string, CodeUnit>();
		for (const unit of units) unitMap.set(unit.id, unit);

		const snapshot: Snapshot = {
			buildId: crypto.randomUUID(),
			embedModel: this.encoder.model,
			dimension: index.dimension,
			poolFactor: this.tuning.poolFactor,
			index,
			units: [...units],
			unitMap,
			counters,
			saved: false,
		};

		this.logger.info(COMPONENT, 'Build complete', {
			units: units.length,
			encoded: documents.length,
			fullRebuild: full,
			forcedRebuild,
			incrementalUpdates: counters.incrementalUpdates,
		});

		return {
			snapshot,
			stats: {...baseStats, forcedRebuild, fullRebuild: full},
		};
	}

	/**
	 * Encode and pool documents. Throws when the encoder drops or adds any.
	 */
	private async encode(ids: string[], texts: string[]): Promise<PlaidDocument[]> {
		if (texts.length === 0) return [];
		const encoder = await this.getEncoder();
		const matrices = await encoder.encodeDocuments(texts);
		if (matrices.length !== texts.length) {
			throw new EmbeddingMismatchError(texts.length, matrices.length);
		}
		return matrices.map((tokens, i) => ({
			id: ids[i],
			tokens: poolTokens(tokens, this.tuning.poolFactor),
		}));
	}

	private getEncoder(): Promise<TokenEncoder> {
		if (!this.encoderReady) {
			this.encoderReady = this.encoder
				.initialize()
				.then(() => this.encoder)
				.catch(error => {
					this.encoderReady = null;
					throw error;
				});
		}
		return this.encoderReady;
	}

	// ============================================================
	// Search
	// ============================================================

	async search(query: string, k: number): Promise<SearchResult[]> {
		const snapshot = this.snapshot;
		if (!snapshot || snapshot.units.length === 0 || k <= 0) {
			return [];
		}

		const encoder = await this.getEncoder();
		const queryTokens = await encoder.encodeQuery(query);
		if (queryTokens.some(token => token.length !== snapshot.dimension)) {
			this.logger.warn(COMPONENT, 'Query token width does not match index', {
				expected: snapshot.dimension,
			});
			return [];
		}

		const hits = snapshot.index.search(queryTokens, k, {
			nprobe: this.tuning.nprobe,
			accept: id => snapshot.unitMap.has(id),
		});
		const results: SearchResult[] = [];
		for (const hit of hits) {
			const unit = snapshot.unitMap.get(hit.id);
			if (unit) results.push(toSearchResult(unit, hit.score));
		}
		return results;
	}

	lookupByName(name: string): CodeUnit[] | null {
		const snapshot = this.snapshot;
		if (!snapshot) return null;
		return findUnitsByName(snapshot.units, name);
	}

	/**
	 * Whether token vectors for `id` are still stored, deleted or not.
	 */
	hasStoredDocument(id: string): boolean {
		return this.snapshot?.index.hasDocument(id) ?? false;
	}

	// ============================================================
	// Persistence
	// ============================================================

	async load(): Promise<boolean> {
		if (await this.guard.hasSentinel()) {
			if (this.guard.held) {
				return this.snapshot !== null;
			}
			if (await this.guard.isLockedElsewhere()) {
				this.logger.warn(COMPONENT, 'Index build in progress elsewhere; not loading', {
					dir: this.store.dir,
				});
				return false;
			}
			await this.cleanupInterruptedBuild();
			return false;
		}

		const snapshot = await this.readPersisted();
		if (!snapshot) return false;
		this.snapshot = snapshot;
		return true;
	}

	private async cleanupInterruptedBuild(): Promise<void> {
		this.logger.warn(COMPONENT, 'Removing leftovers of an interrupted build', {
			dir: this.store.dir,
		});
		try {
			await this.discardInterruptedBuild();
		} catch (error) {
			this.logger.warn(COMPONENT, 'Cleanup of interrupted build incomplete', {
				error: error instanceof Error ? error.message : String(error),
			});
			await this.guard.clearInProgress();
		}
	}

	/**
	 * Drop rebuild dirs and token rows newer than the saved generation, then
	 * clear the sentinel. Appends reuse the next generation number, so rows
	 * left by an unsaved append must be gone before another append.
	 */
	private async discardInterruptedBuild(): Promise<void> {
		await this.store.removeBuildLeftovers();
		const meta = await this.store.readMeta();
		if (meta.status === 'ok') {
			await PlaidIndex.discardAfter(this.store.activeDir, meta.value.incremental_updates);
		}
		await this.guard.clearInProgress();
	}

	private async readPersisted(): Promise<Snapshot | null> {
		try {
			const metaResult = await this.store.readMeta();
			if (metaResult.status === 'missing') {
				return null;
			}
			if (metaResult.status === 'corrupt') {
				this.logger.warn(COMPONENT, 'Unreadable index metadata', {
					reason: metaResult.reason,
				});
				return null;
			}
			const meta = metaResult.value;

			if (meta.embed_model !== this.encoder.model) {
				this.logger.warn(COMPONENT, 'Index was built with a different model; rebuild required', {
					indexed: meta.embed_model,
					configured: this.encoder.model,
				});
				return null;
			}

			const consistency = checkBuildConsistency(
				await readTopLevelMeta(this.indexDir),
				this.kind,
				meta.build_id,
			);
			if (!consistency.consistent) {
				this.logger.warn(COMPONENT, 'Index metadata out of step', {
					reason: consistency.reason,
				});
				return null;
			}

			const units = meta.units.map(persistedToUnit);
			if (units.length !== meta.count) {
				this.logger.warn(COMPONENT, 'Unit count does not match metadata', {
					count: meta.count,
					units: units.length,
				});
				return null;
			}

			const index = await PlaidIndex.open(
				this.store.activeDir,
				meta.dimension,
				meta.incremental_updates,
			);
			const missing = units.filter(unit => !index.hasDocument(unit.id));
			if (missing.length > 0) {
				this.logger.warn(COMPONENT, 'Index is missing documents listed in metadata', {
					missing: missing.length,
				});
				return null;
			}

			const unitMap = new Map<string, CodeUnit>();
			for (const unit of units) unitMap.set(unit.id, unit);

			return {
				buildId: meta.build_id,
				embedModel: meta.embed_model,
				dimension: meta.dimension,
				poolFactor: meta.pool_factor,
				index,
				units,
				unitMap,
				counters: {
					incrementalUpdates: meta.incremental_updates,
					deletedSinceRebuild: meta.deleted_since_rebuild,
					unitsAtLastRebuild: meta.units_at_last_rebuild,
				},
				saved: true,
			};
		} catch (error) {
			this.logger.warn(COMPONENT, 'Failed to load index', {
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}
	}

	async save(): Promise<void> {
		await this.mutex.runExclusive(async () => {
			const snapshot = this.snapshot;
			if (!snapshot) {
				throw new IndexNotFoundError('Nothing to save: no index has been built or loaded');
			}

			const ownBuild = this.guard.held;
			await this.guard.acquire();
			try {
				if (!ownBuild && (await this.guard.hasSentinel())) {
					await this.discardInterruptedBuild();
				}
				await writeTopLevelMeta(this.indexDir, {
					backend: this.kind,
					embedModel: snapshot.embedModel,
					dimension: snapshot.dimension,
					count: snapshot.units.length,
					buildId: snapshot.buildId,
				});
				await this.store.writeMeta({
					build_id: snapshot.buildId,
					embed_model: snapshot.embedModel,
					dimension: snapshot.dimension,
					count: snapshot.units.length,
					pool_factor: snapshot.poolFactor,
					incremental_updates: snapshot.counters.incrementalUpdates,
					deleted_since_rebuild: snapshot.counters.deletedSinceRebuild,
					units_at_last_rebuild: snapshot.counters.unitsAtLastRebuild,
					units: snapshot.units.map(unitToPersisted),
				});
				this.snapshot = {...snapshot, saved: true};
				await this.guard.clearInProgress();
			} finally {
				await this.guard.releaseLock();
			}
		});
	}

	info(): BackendInfo {
		const snapshot = this.snapshot;
		return {
			backend: this.kind,
			embedModel: snapshot?.embedModel ?? this.encoder.model,
			dimension: snapshot ? snapshot.dimension : null,
			count: snapshot?.units.length ?? 0,
			indexPath: this.store.dir,
			extra: {
				poolFactor: snapshot?.poolFactor ?? this.tuning.poolFactor,
				nprobe: this.tuning.nprobe,
				centroids: snapshot?.index.centroids.length ?? 0,
				storedDocuments: snapshot?.index.documentCount ?? 0,
				incrementalUpdates: snapshot?.counters.incrementalUpdates ?? 0,
				deletedSinceRebuild: snapshot?.counters.deletedSinceRebuild ?? 0,
				unitsAtLastRebuild: snapshot?.counters.unitsAtLastRebuild ?? 0,
				buildId: snapshot?.buildId ?? null,
			},
		};
	}

	loadedBuildId(): string | null {
		return this.snapshot?.buildId ?? null;
	}

	async close(): Promise<void> {
		await this.guard.releaseLock();
		this.encoder.close();
		this.encoderReady = null;
	}
}
