/**
 * Centroid-partitioned late-interaction index.
 *
 * Every stored document token carries the code of its nearest centroid.
 * A query probes the `nprobe` nearest centroids per query token to collect
 * candidate documents, then ranks them by exact MaxSim over their stored
 * token vectors.
 *
 * PlaidIndex objects are immutable: addDocuments() appends to disk and
 * returns a new object, so a search running against the old object is
 * never affected by a concurrent update.
 */

import fs from 'node:fs/promises';
import {
	appendRows,
	connect,
	createCentroidSchema,
	createTokenSchema,
	integerField,
	readAllRows,
	stringField,
	vectorFieldValue,
	writeTable,
} from '../lance.js';
import {dot, topK} from '../vectors.js';
import {centroidCount, kmeans, nearest} from './kmeans.js';

const CENTROIDS_TABLE = 'centroids';
const TOKENS_TABLE = 'tokens';

/**
 * A document ready for indexing: pooled, normalised token vectors.
 */
export interface PlaidDocument {
	id: string;
	tokens: Float32Array[];
}

interface StoredToken {
	code: number;
	vector: Float32Array;
}

export interface PlaidSearchOptions {
	nprobe: number;
	/** Documents rejected here are never scored */
	accept?: (id: string) => boolean;
}

export class PlaidIndex {
	readonly dimension: number;
	readonly centroids: readonly Float32Array[];
	private readonly docTokens: ReadonlyMap<string, readonly Float32Array[]>;
	private readonly postings: ReadonlyMap<number, ReadonlySet<string>>;

	private constructor(
		dimension: number,
		centroids: readonly Float32Array[],
		docTokens: ReadonlyMap<string, readonly Float32Array[]>,
		postings: ReadonlyMap<number, ReadonlySet<string>>,
	) {
		this.dimension = dimension;
		this.centroids = centroids;
		this.docTokens = docTokens;
		this.postings = postings;
	}

	get documentCount(): number {
		return this.docTokens.size;
	}

	hasDocument(id: string): boolean {
		return this.docTokens.has(id);
	}

	documentIds(): string[] {
		return [...this.docTokens.keys()];
	}

	// ============================================================
	// Construction
	// ============================================================

	/**
	 * Train centroids over every token and write a fresh index into `dir`.
	 */
	static async create(
		dir: string,
		documents: readonly PlaidDocument[],
		dimension: number,
	): Promise<PlaidIndex> {
		const allTokens = documents.flatMap(doc => doc.tokens);
		const {centroids, assignments} = kmeans(
			allTokens,
			centroidCount(allTokens.length),
		);

		await fs.mkdir(dir, {recursive: true});
		const docTokens = new Map<string, Float32Array[]>();
		const postings = new Map<number, Set<string>>();
		const tokenRows: Array<Record<string, unknown>> = [];
		let offset = 0;
		for (const doc of documents) {
			docTokens.set(doc.id, doc.tokens);
			for (const token of doc.tokens) {
				const code = assignments[offset++];
				addPosting(postings, code, doc.id);
				tokenRows.push({
					doc_id: doc.id,
					code,
					generation: 0,
					vector: Array.from(token),
				});
			}
		}

		if (centroids.length > 0) {
			const db = await connect(dir);
			await writeTable(
				db,
				CENTROIDS_TABLE,
				createCentroidSchema(dimension),
				centroids.map((vector, id) => ({id, vector: Array.from(vector)})),
			);
			await writeTable(db, TOKENS_TABLE, createTokenSchema(dimension), tokenRows);
		}

		return new PlaidIndex(dimension, centroids, docTokens, postings);
	}

	/**
	 * Read an index back, ignoring rows newer than `maxGeneration` (appended
	 * by a build whose metadata was never saved). When a document was
	 * appended more than once, the newest generation wins.
	 */
	static async open(
		dir: string,
		dimension: number,
		maxGeneration: number,
	): Promise<PlaidIndex> {
		const db = await connect(dir);
		const tables = await db.tableNames();
		if (!tables.includes(CENTROIDS_TABLE) || !tables.includes(TOKENS_TABLE)) {
			return new PlaidIndex(dimension, [], new Map(), new Map());
		}

		const centroidRows = await readAllRows(await db.openTable(CENTROIDS_TABLE));
		const byId = new Map<number, Float32Array>();
		for (const row of centroidRows) {
			byId.set(integerField(row, 'id'), vectorFieldValue(row, 'vector', dimension));
		}
		const centroids: Float32Array[] = [];
		for (let id = 0; id < centroidRows.length; id++) {
			const centroid = byId.get(id);
			if (!centroid) {
				throw new Error(`Centroid ${id} is missing`);
			}
			centroids.push(centroid);
		}

		const newest = new Map<string, {generation: number; tokens: StoredToken[]}>();
		for (const row of await readAllRows(await db.openTable(TOKENS_TABLE))) {
			const generation = integerField(row, 'generation');
			if (generation > maxGeneration) continue;
			const docId = stringField(row, 'doc_id');
			const token = {
				code: integerField(row, 'code'),
				vector: vectorFieldValue(row, 'vector', dimension),
			};
			const current = newest.get(docId);
			if (!current || generation > current.generation) {
				newest.set(docId, {generation, tokens: [token]});
			} else if (generation === current.generation) {
				current.tokens.push(token);
			}
		}

		const docTokens = new Map<string, Float32Array[]>();
		const postings = new Map<number, Set<string>>();
		for (const [docId, {tokens}] of newest) {
			docTokens.set(docId, tokens.map(token => token.vector));
			for (const token of tokens) {
				addPosting(postings, token.code, docId);
			}
		}

		return new PlaidIndex(dimension, centroids, docTokens, postings);
	}

	/**
	 * Append documents under existing centroids. A document id that is
	 * already present is superseded by the new tokens.
	 */
	async addDocuments(
		dir: string,
		documents: readonly PlaidDocument[],
		generation: number,
	): Promise<PlaidIndex> {
		if (this.centroids.length === 0) {
			throw new Error('Cannot append to an index without centroids');
		}

		const docTokens = new Map(this.docTokens);
		const postings = new Map<number, Set<string>>();
		for (const [code, ids] of this.postings) {
			postings.set(code, new Set(ids));
		}

		const rows: Array<Record<string, unknown>> = [];
		for (const doc of documents) {
			docTokens.set(doc.id, doc.tokens);
			for (const token of doc.tokens) {
				const code = nearest(token, this.centroids);
				addPosting(postings, code, doc.id);
				rows.push({doc_id: doc.id, code, generation, vector: Array.from(token)});
			}
		}

		const db = await connect(dir);
		const tokens = await db.openTable(TOKENS_TABLE);
		await appendRows(tokens, createTokenSchema(this.dimension), rows);

		return new PlaidIndex(this.dimension, this.centroids, docTokens, postings);
	}

	/**
	 * Remove rows appended after `generation` (an unsaved incremental build).
	 */
	static async discardAfter(dir: string, generation: number): Promise<void> {
		const db = await connect(dir);
		if (!(await db.tableNames()).includes(TOKENS_TABLE)) return;
		const tokens = await db.openTable(TOKENS_TABLE);
		await tokens.delete(`generation > ${Math.floor(generation)}`);
	}

	// ============================================================
	// Search
	// ============================================================

	search(
		queryTokens: readonly Float32Array[],
		k: number,
		options: PlaidSearchOptions,
	): Array<{id: string; score: number}> {
		if (queryTokens.length === 0 || k <= 0) return [];
		const accept = options.accept ?? (() => true);

		const candidates = new Set<string>();
		for (const query of queryTokens) {
			const scores = this.centroids.map(centroid => dot(query, centroid));
			for (const code of topK(scores, options.nprobe)) {
				for (const id of this.postings.get(code) ?? []) {
					if (accept(id)) candidates.add(id);
				}
			}
		}
		if (candidates.size === 0) {
			for (const id of this.docTokens.keys()) {
				if (accept(id)) candidates.add(id);
			}
		}

		const ids = [...candidates];
		const scores = ids.map(id => maxSim(queryTokens, this.docTokens.get(id) ?? []));
		return topK(scores, k).map(i => ({id: ids[i], score: scores[i]}));
	}
}

/**
 * Late-interaction score: Σ over query tokens of the best document match.
 */
export function maxSim(
	queryTokens: readonly Float32Array[],
	docTokens: readonly Float32Array[],
): number {
	if (docTokens.length === 0) return 0;
	let total = 0;
	for (const query of queryTokens) {
		let best = -Infinity;
		for (const token of docTokens) {
			const score = dot(query, token);
			if (score > best) best = score;
		}
		total += best;
	}
	return total;
}

function addPosting(
	postings: Map<number, Set<string>>,
	code: number,
	id: string,
): void {
	let ids = postings.get(code);
	if (!ids) {
		ids = new Set();
		postings.set(code, ids);
	}
	ids.add(id);
}
