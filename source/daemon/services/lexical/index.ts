/**
 * Backend-independent BM25 index over unit metadata.
 *
 * Stored as a LanceDB table with a full-text index on pre-tokenized text.
 * It is rebuilt from scratch on every index run; the unit rows it holds also
 * serve exact-name lookups.
 */

import path from 'node:path';
import * as lancedb from '@lancedb/lancedb';
import {Field, Int32, Schema, Utf8} from 'apache-arrow';
import {INDEX_LAYOUT} from '../../lib/constants.js';
import type {Logger} from '../../lib/logger.js';
import {
	connect,
	integerField,
	readAllRows,
	stringField,
	writeTable,
	type Table,
} from '../backends/lance.js';
import {
	findUnitsByName,
	persistedToUnit,
	persistedUnitSchema,
	unitToPersisted,
} from '../backends/metadata.js';
import type {LexicalRanker} from '../backends/types.js';
import type {CodeUnit} from '../types.js';
import {tokenizeForBm25} from './tokenize.js';

export {tokenizeForBm25} from './tokenize.js';

const TABLE_NAME = 'units';

function createUnitsSchema(): Schema {
	return new Schema([
		new Field('id', new Utf8(), false),
		new Field('name', new Utf8(), false),
		new Field('kind', new Utf8(), false),
		new Field('language', new Utf8(), false),
		new Field('file_path', new Utf8(), false),
		new Field('start_line', new Int32(), false),
		new Field('end_line', new Int32(), false),
		new Field('signature', new Utf8(), false),
		new Field('docstring_summary', new Utf8(), false),
		new Field('file_hash', new Utf8(), false),
		new Field('text', new Utf8(), false),
	]);
}

/**
 * Text indexed for a unit: name, signature, doc and path, tokenized.
 */
export function lexicalText(unit: CodeUnit): string {
	return tokenizeForBm25(
		[unit.name, unit.signature, unit.docstringSummary, unit.filePath].join(' '),
	);
}

export class LexicalIndex implements LexicalRanker {
	readonly dir: string;
	private readonly logger: Logger;
	private table: Table | null = null;
	private units: readonly CodeUnit[] | null = null;

	constructor(indexDir: string, logger: Logger) {
		this.dir = path.join(indexDir, INDEX_LAYOUT.LEXICAL_DIR);
		this.logger = logger;
	}

	get loaded(): boolean {
		return this.units !== null;
	}

	/**
	 * Replace the table with rows for `units` and re-create the FTS index.
	 */
	async rebuild(units: CodeUnit[]): Promise<void> {
		const db = await connect(this.dir);
		const rows = units.map(unit => ({
			...unitToPersisted(unit),
			text: lexicalText(unit),
		}));
		const table = await writeTable(db, TABLE_NAME, createUnitsSchema(), rows);
		if (rows.length > 0) {
			await table.createIndex('text', {
				config: lancedb.Index.fts(),
				replace: true,
			});
		}
		this.table = table;
		this.units = [...units];
		this.logger.info('LexicalIndex', 'Rebuilt lexical index', {units: units.length});
	}

	/**
	 * Open the persisted table. False when it has never been built.
	 */
	async load(): Promise<boolean> {
		try {
			const db = await connect(this.dir);
			if (!(await db.tableNames()).includes(TABLE_NAME)) {
				return false;
			}
			const table = await db.openTable(TABLE_NAME);
			const units: CodeUnit[] = [];
			for (const row of await readAllRows(table)) {
				units.push(
					persistedToUnit(
						persistedUnitSchema.parse({
							id: stringField(row, 'id'),
							name: stringField(row, 'name'),
							kind: stringField(row, 'kind'),
							language: stringField(row, 'language'),
							file_path: stringField(row, 'file_path'),
							start_line: integerField(row, 'start_line'),
							end_line: integerField(row, 'end_line'),
							signature: stringField(row, 'signature'),
							docstring_summary: stringField(row, 'docstring_summary'),
							file_hash: stringField(row, 'file_hash'),
						}),
					),
				);
			}
			this.table = table;
			this.units = units;
			return true;
		} catch (error) {
			this.logger.warn('LexicalIndex', 'Failed to load lexical index', {
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}

	async search(
		query: string,
		k: number,
	): Promise<Array<{id: string; score: number}>> {
		const tokens = tokenizeForBm25(query);
		if (!tokens || k <= 0) return [];
		if (!this.table && !(await this.load())) return [];
		const table = this.table;
		if (!table || this.units?.length === 0) return [];

		const rows: unknown[] = await table.search(tokens, 'fts').limit(k).toArray();
		return rows.map((row, rank) => ({
			id: stringField(row, 'id'),
			score: scoreOf(row) ?? 1 / (rank + 1),
		}));
	}

	/**
	 * Exact-name lookup over the stored rows; null when not loaded.
	 */
	findByName(name: string): CodeUnit[] | null {
		const units = this.units;
		if (!units) return null;
		return findUnitsByName(units, name);
	}
}

function scoreOf(row: unknown): number | undefined {
	if (typeof row === 'object' && row !== null && '_score' in row) {
		const score = row._score;
		return typeof score === 'number' ? score : undefined;
	}
	return undefined;
}
