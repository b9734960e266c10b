/**
 * Single-vector backend: one dense embedding per unit in a flat
 * inner-product index.
 *
 * Vectors are L2-normalised so inner product equals cosine similarity.
 * Deletion is exact: a rebuilt matrix simply omits deleted rows.
 */

import crypto from 'node:crypto';
import path from 'node:path';
import {BuildGuard} from '../../../lib/build-lock.js';
import {INDEX_LAYOUT} from '../../../lib/constants.js';
import {EmbeddingMismatchError, IndexNotFoundError} from '../../../lib/errors.js';
import type {Logger} from '../../../lib/logger.js';
import {Mutex} from '../../../lib/mutex.js';
import type {EmbeddingProvider} from '../../../providers/types.js';
import {hasIdentifierToken, reciprocalRankFusion} from '../../search/fusion.js';
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
} from '../metadata.js';
import type {
	BackendBaseOptions,
	BackendInfo,
	BackendStats,
	LexicalRanker,
	SearchBackend,
} from '../types.js';
import {dotRow, l2Normalize, topK} from '../vectors.js';
import {SingleVectorStore} from './store.js';

export interface SingleVectorBackendOptions extends BackendBaseOptions {
	embedder: EmbeddingProvider;
	/** BM25 ranking fused into results for identifier-bearing queries */
	lexical?: LexicalRanker;
}

/**
 * Everything a search needs, replaced as a whole by build() and load().
 */
interface Snapshot {
	readonly buildId: string;
	readonly embedModel: string;
	readonly dimension: number;
	/** Units in matrix row order */
	readonly units: readonly CodeUnit[];
	readonly unitMap: ReadonlyMap<string, CodeUnit>;
	readonly rowOf: ReadonlyMap<string, number>;
	/** Row-major, units.length x dimension */
	readonly matrix: Float32Array;
	/** Persisted vectors table; null until saved (or when empty) */
	readonly table: string | null;
	readonly saved: boolean;
}

const COMPONENT = 'SingleVectorBackend';

export class SingleVectorBackend implements SearchBackend {
	readonly kind = 'single-vector' as const;
	private readonly indexDir: string;
	private readonly dir: string;
	private readonly logger: Logger;
	private readonly embedder: EmbeddingProvider;
	private readonly lexical: LexicalRanker | undefined;
	private readonly store: SingleVectorStore;
	private readonly guard: BuildGuard;
	private readonly mutex = new Mutex();
	private snapshot: Snapshot | null = null;
	private embedderReady: Promise<EmbeddingProvider> | null = null;

	constructor(options: SingleVectorBackendOptions) {
		this.indexDir = options.indexDir;
		this.dir = path.join(options.indexDir, INDEX_LAYOUT.SINGLE_VECTOR_DIR);
		this.logger = options.logger;
		this.embedder = options.embedder;
		this.lexical = options.lexical;
		this.store = new SingleVectorStore(this.dir);
		this.guard = new BuildGuard(this.dir, options.logger);
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
			await this.guard.acquire();
			try {
				const previous = rebuild ? null : await this.currentOrPersisted();
				await this.guard.markInProgress();
				const {snapshot, stats} = await this.assemble(units, texts, previous);
				this.snapshot = snapshot;
				return stats;
			} catch (error) {
				// Nothing on disk changed; drop the claim
				await this.guard.clearInProgress();
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

	private async assemble(
		units: CodeUnit[],
		texts: string[],
		previous: Snapshot | null,
	): Promise<{snapshot: Snapshot; stats: BackendStats}> {
		const partition = partitionUnits(units, previous?.unitMap ?? new Map());
		const toEmbed = previous
			? [...partition.added, ...partition.changed].sort((a, b) => a - b)
			: units.map((_, i) => i);

		const embedded = new Map<number, Float32Array>();
		await this.embedInto(embedded, toEmbed, texts);

		let dimension = previous?.dimension ?? 0;
		let fullRebuild = previous === null;
		const firstNew = embedded.values().next();
		if (!firstNew.done) {
			const newDimension = firstNew.value.length;
			if (previous && newDimension !== previous.dimension) {
				this.logger.info(COMPONENT, 'Embedding dimension changed; re-embedding all units', {
					from: previous.dimension,
					to: newDimension,
				});
				const rest = units.map((_, i) => i).filter(i => !embedded.has(i));
				await this.embedInto(embedded, rest, texts);
				fullRebuild = true;
			}
			dimension = newDimension;
		}

		const matrix = new Float32Array(units.length * dimension);
		const rowOf = new Map<string, number>();
		const unitMap = new Map<string, CodeUnit>();
		units.forEach((unit, row) => {
			const vector =
				embedded.get(row) ?? this.previousVector(previous, unit.id);
			matrix.set(vector, row * dimension);
			rowOf.set(unit.id, row);
			unitMap.set(unit.id, unit);
		});

		const snapshot: Snapshot = {
			buildId: crypto.randomUUID(),
			embedModel: this.embedder.model,
			dimension,
			units: [...units],
			unitMap,
			rowOf,
			matrix,
			table: null,
			saved: false,
		};

		const stats: BackendStats = previous
			? {
					new: partition.added.length,
					updated: partition.changed.length,
					unchanged: partition.unchanged.length,
					deleted: partition.deletedIds.length,
					embedModel: this.embedder.model,
					backend: this.kind,
					forcedRebuild: false,
					fullRebuild,
			  }
			: {
					new: units.length,
					updated: 0,
					unchanged: 0,
					deleted: 0,
					embedModel: this.embedder.model,
					backend: this.kind,
					forcedRebuild: false,
					fullRebuild: true,
			  };

		this.logger.info(COMPONENT, 'Build complete', {
			units: units.length,
			embedded: embedded.size,
			deleted: stats.deleted,
			fullRebuild: stats.fullRebuild,
		});
		return {snapshot, stats};
	}

	private previousVector(previous: Snapshot | null, id: string): Float32Array {
		const row = previous?.rowOf.get(id);
		if (!previous || row === undefined) {
			throw new Error(`No stored vector for unchanged unit ${id}`);
		}
		return previous.matrix.subarray(
			row * previous.dimension,
			(row + 1) * previous.dimension,
		);
	}

	/**
	 * Embed `texts[i]` for every i in `indices` in one batch.
	 */
	private async embedInto(
		target: Map<number, Float32Array>,
		indices: number[],
		texts: string[],
	): Promise<void> {
		if (indices.length === 0) return;
		const embedder = await this.getEmbedder();
		const vectors = await embedder.embed(indices.map(i => texts[i]));
		if (vectors.length !== indices.length) {
			throw new EmbeddingMismatchError(indices.length, vectors.length);
		}
		const dimension = vectors[0].length;
		vectors.forEach((vector, j) => {
			if (vector.length !== dimension) {
				throw new Error(
					`Embedder returned vectors of differing widths (${dimension} and ${vector.length})`,
				);
			}
			target.set(indices[j], l2Normalize(Float32Array.from(vector)));
		});
	}

	private getEmbedder(): Promise<EmbeddingProvider> {
		if (!this.embedderReady) {
			this.embedderReady = this.embedder
				.initialize()
				.then(() => this.embedder)
				.catch(error => {
					this.embedderReady = null;
					throw error;
				});
		}
		return this.embedderReady;
	}

	// ============================================================
	// Search
	// ============================================================

	async search(query: string, k: number): Promise<SearchResult[]> {
		// One read of the reference; a concurrent build swaps, never mutates
		const snapshot = this.snapshot;
		if (!snapshot || snapshot.units.length === 0 || k <= 0) {
			return [];
		}

		const embedder = await this.getEmbedder();
		const queryVector = l2Normalize(Float32Array.from(await embedder.embedQuery(query)));
		if (queryVector.length !== snapshot.dimension) {
			this.logger.warn(COMPONENT, 'Query embedding width does not match index', {
				expected: snapshot.dimension,
				actual: queryVector.length,
			});
			return [];
		}

		const scores = new Float32Array(snapshot.units.length);
		for (let row = 0; row < snapshot.units.length; row++) {
			scores[row] = dotRow(snapshot.matrix, row, snapshot.dimension, queryVector);
		}

		const fuse = this.lexical !== undefined && hasIdentifierToken(query);
		const fetchK = fuse ? Math.max(k * 3, 20) : k;
		const dense = topK(scores, fetchK);

		if (!fuse || !this.lexical) {
			return dense.map(row => toSearchResult(snapshot.units[row], scores[row]));
		}

		let lexicalIds: string[];
		try {
			const hits = await this.lexical.search(query, fetchK);
			lexicalIds = hits.map(hit => hit.id).filter(id => snapshot.unitMap.has(id));
		} catch (error) {
			this.logger.warn(COMPONENT, 'BM25 search failed; using dense results only', {
				error: error instanceof Error ? error.message : String(error),
			});
			return dense
				.slice(0, k)
				.map(row => toSearchResult(snapshot.units[row], scores[row]));
		}

		const denseIds = dense.map(row => snapshot.units[row].id);
		const results: SearchResult[] = [];
		for (const {id, score} of reciprocalRankFusion([denseIds, lexicalIds], k)) {
			const unit = snapshot.unitMap.get(id);
			if (unit) results.push(toSearchResult(unit, score));
		}
		return results;
	}

	lookupByName(name: string): CodeUnit[] | null {
		const snapshot = this.snapshot;
		if (!snapshot) return null;
		return findUnitsByName(snapshot.units, name);
	}

	// ============================================================
	// Persistence
	// ============================================================

	async load(): Promise<boolean> {
		if (await this.guard.hasSentinel()) {
			if (this.guard.held) {
				// Our own unsaved build
				return this.snapshot !== null;
			}
			if (await this.guard.isLockedElsewhere()) {
				this.logger.warn(COMPONENT, 'Index build in progress elsewhere; not loading', {
					dir: this.dir,
				});
				return false;
			}
			this.logger.warn(COMPONENT, 'Removing leftovers of an interrupted build', {
				dir: this.dir,
			});
			await this.guard.clearInProgress();
			return false;
		}

		const snapshot = await this.readPersisted();
		if (!snapshot) return false;
		this.snapshot = snapshot;
		return true;
	}

	/**
	 * Read and validate the persisted index. Null on any inconsistency.
	 */
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

			if (meta.embed_model !== this.embedder.model) {
				this.logger.warn(COMPONENT, 'Index was built with a different model; rebuild required', {
					indexed: meta.embed_model,
					configured: this.embedder.model,
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

			const vectors =
				meta.table === null
					? new Map<string, Float32Array>()
					: await this.store.readVectors(meta.table, meta.dimension);
			if (vectors.size !== units.length) {
				this.logger.warn(COMPONENT, 'Vector count does not match metadata', {
					count: meta.count,
					vectors: vectors.size,
				});
				return null;
			}

			const matrix = new Float32Array(units.length * meta.dimension);
			const rowOf = new Map<string, number>();
			const unitMap = new Map<string, CodeUnit>();
			for (const [row, unit] of units.entries()) {
				const vector = vectors.get(unit.id);
				if (!vector) {
					this.logger.warn(COMPONENT, 'Unit has no stored vector', {id: unit.id});
					return null;
				}
				matrix.set(vector, row * meta.dimension);
				rowOf.set(unit.id, row);
				unitMap.set(unit.id, unit);
			}

			return {
				buildId: meta.build_id,
				embedModel: meta.embed_model,
				dimension: meta.dimension,
				units,
				unitMap,
				rowOf,
				matrix,
				table: meta.table,
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

			// Re-saving a loaded index writes the same files a build does
			await this.guard.acquire();
			try {
				let table = snapshot.table;
				if (!snapshot.saved && snapshot.units.length > 0) {
					table = await this.store.writeVectors(
						snapshot.buildId,
						snapshot.units.map(unit => unit.id),
						snapshot.matrix,
						snapshot.dimension,
					);
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
					table,
					units: snapshot.units.map(unitToPersisted),
				});

				this.snapshot = {...snapshot, table, saved: true};

				const dropped = await this.store.dropTablesExcept(table);
				if (dropped.length > 0) {
					this.logger.debug(COMPONENT, 'Dropped superseded vector tables', {dropped});
				}
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
			embedModel: snapshot?.embedModel ?? this.embedder.model,
			dimension: snapshot ? snapshot.dimension : null,
			count: snapshot?.units.length ?? 0,
			indexPath: this.dir,
			extra: {
				table: snapshot?.table ?? null,
				buildId: snapshot?.buildId ?? null,
				saved: snapshot?.saved ?? false,
				bm25Fusion: this.lexical !== undefined,
			},
		};
	}

	loadedBuildId(): string | null {
		return this.snapshot?.buildId ?? null;
	}

	async close(): Promise<void> {
		await this.guard.releaseLock();
		this.embedder.close();
		this.embedderReady = null;
	}
}
