/**
 * LanceDB helpers shared by the backend stores.
 */

import * as lancedb from '@lancedb/lancedb';
import {makeArrowTable} from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import {
	Field,
	FixedSizeList,
	Float32,
	Int32,
	Schema,
	Utf8,
} from 'apache-arrow';
import {normalizeVector} from './vectors.js';

export type {Connection, Table};

export function connect(dbPath: string): Promise<Connection> {
	return lancedb.connect(dbPath);
}

export function vectorField(name: string, dimensions: number): Field {
	return new Field(
		name,
		new FixedSizeList(dimensions, new Field('item', new Float32(), false)),
		false,
	);
}

/**
 * `id` + `vector` rows: single-vector unit embeddings.
 */
export function createIdVectorSchema(dimensions: number): Schema {
	return new Schema([
		new Field('id', new Utf8(), false),
		vectorField('vector', dimensions),
	]);
}

export function createCentroidSchema(dimensions: number): Schema {
	return new Schema([
		new Field('id', new Int32(), false),
		vectorField('vector', dimensions),
	]);
}

/**
 * One row per stored (pooled) document token. `generation` is the
 * incremental update that appended the row (0 for a full rebuild).
 */
export function createTokenSchema(dimensions: number): Schema {
	return new Schema([
		new Field('doc_id', new Utf8(), false),
		new Field('code', new Int32(), false),
		new Field('generation', new Int32(), false),
		vectorField('vector', dimensions),
	]);
}

/**
 * Create (or replace) a table and fill it with `rows`.
 */
export async function writeTable(
	db: Connection,
	name: string,
	schema: Schema,
	rows: Array<Record<string, unknown>>,
): Promise<Table> {
	const existing = await db.tableNames();
	if (existing.includes(name)) {
		await db.dropTable(name);
	}
	const table = await db.createEmptyTable(name, schema);
	await appendRows(table, schema, rows);
	return table;
}

export async function appendRows(
	table: Table,
	schema: Schema,
	rows: Array<Record<string, unknown>>,
): Promise<void> {
	if (rows.length === 0) return;
	const arrowTable = makeArrowTable(rows, {schema});
	await table.add(arrowTable);
}

/**
 * Read every row of a table. LanceDB's default query limit is small, so the
 * row count is passed explicitly.
 */
export async function readAllRows(table: Table): Promise<unknown[]> {
	const count = await table.countRows();
	if (count === 0) return [];
	const rows: unknown[] = await table.query().limit(count).toArray();
	return rows;
}

// ============================================================================
// Row field access
// ============================================================================

function field(row: unknown, name: string): unknown {
	if (typeof row !== 'object' || row === null || !(name in row)) {
		return undefined;
	}
	return Reflect.get(row, name);
}

export function stringField(row: unknown, name: string): string {
	const value = field(row, name);
	if (typeof value !== 'string') {
		throw new Error(`Row field "${name}" is not a string`);
	}
	return value;
}

export function integerField(row: unknown, name: string): number {
	const value = field(row, name);
	const numeric = typeof value === 'bigint' ? Number(value) : value;
	if (typeof numeric !== 'number' || !Number.isInteger(numeric)) {
		throw new Error(`Row field "${name}" is not an integer`);
	}
	return numeric;
}

export function vectorFieldValue(
	row: unknown,
	name: string,
	dimensions: number,
): Float32Array {
	const vector = normalizeVector(field(row, name));
	if (!vector || vector.length !== dimensions) {
		throw new Error(
			`Row field "${name}" is not a ${dimensions}-dimensional vector`,
		);
	}
	// Arrow-backed arrays may share a buffer with the batch; copy out
	return Float32Array.from(vector);
}
