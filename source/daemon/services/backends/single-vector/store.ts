/**
 * On-disk state of the single-vector backend:
 *   vector/meta.json          build metadata + unit records
 *   vector/lancedb/           one `vectors_<buildId>` table per build
 */

import path from 'node:path';
import {z} from 'zod';
import {readJsonFile, writeJsonAtomic, type JsonReadResult} from '../../../lib/atomic.js';
import {INDEX_LAYOUT} from '../../../lib/constants.js';
import {
	connect,
	createIdVectorSchema,
	readAllRows,
	stringField,
	vectorFieldValue,
	writeTable,
} from '../lance.js';
import {persistedUnitSchema} from '../metadata.js';

const TABLE_PREFIX = 'vectors_';

export const singleVectorMetaSchema = z.object({
	build_id: z.string(),
	embed_model: z.string(),
	dimension: z.number().int().nonnegative(),
	count: z.number().int().nonnegative(),
	/** null when the index is empty */
	table: z.string().nullable(),
	units: z.array(persistedUnitSchema),
});

export type SingleVectorMeta = z.infer<typeof singleVectorMetaSchema>;

export class SingleVectorStore {
	readonly dir: string;

	constructor(dir: string) {
		this.dir = dir;
	}

	get metaPath(): string {
		return path.join(this.dir, INDEX_LAYOUT.META_FILE);
	}

	get dbPath(): string {
		return path.join(this.dir, 'lancedb');
	}

	readMeta(): Promise<JsonReadResult<SingleVectorMeta>> {
		return readJsonFile(this.metaPath, singleVectorMetaSchema);
	}

	async writeMeta(meta: SingleVectorMeta): Promise<void> {
		await writeJsonAtomic(this.metaPath, meta);
	}

	/**
	 * Write this build's vectors to a fresh table. Returns the table name.
	 */
	async writeVectors(
		buildId: string,
		ids: readonly string[],
		matrix: Float32Array,
		dimension: number,
	): Promise<string> {
		const name = TABLE_PREFIX + buildId.replaceAll('-', '');
		const db = await connect(this.dbPath);
		const rows = ids.map((id, row) => ({
			id,
			vector: Array.from(matrix.subarray(row * dimension, (row + 1) * dimension)),
		}));
		await writeTable(db, name, createIdVectorSchema(dimension), rows);
		return name;
	}

	/**
	 * Read a table back as id -> vector.
	 */
	async readVectors(
		table: string,
		dimension: number,
	): Promise<Map<string, Float32Array>> {
		const db = await connect(this.dbPath);
		const handle = await db.openTable(table);
		const vectors = new Map<string, Float32Array>();
		for (const row of await readAllRows(handle)) {
			vectors.set(stringField(row, 'id'), vectorFieldValue(row, 'vector', dimension));
		}
		return vectors;
	}

	/**
	 * Drop every vectors table except `keep`. Older tables stay readable
	 * until the metadata pointing at them has been replaced.
	 */
	async dropTablesExcept(keep: string | null): Promise<string[]> {
		const db = await connect(this.dbPath);
		const dropped: string[] = [];
		for (const name of await db.tableNames()) {
			if (name.startsWith(TABLE_PREFIX) && name !== keep) {
				await db.dropTable(name);
				dropped.push(name);
			}
		}
		return dropped;
	}
}
