/**
 * Persisted index metadata shared by both backends.
 *
 * The top-level `index/meta.json` names the backend that owns the active
 * index. save() writes it strictly before the backend's own meta.json; both
 * carry the same build_id so a reader can detect the window where only the
 * first write has landed.
 */

import path from 'node:path';
import {z} from 'zod';
import {readJsonFile, writeJsonAtomic, type JsonReadResult} from '../../lib/atomic.js';
import {INDEX_FORMAT_VERSION, INDEX_LAYOUT} from '../../lib/constants.js';
import {InvalidArgumentError} from '../../lib/errors.js';
import type {CodeUnit} from '../types.js';
import {BACKEND_KINDS, type BackendKind} from './types.js';

// ============================================================================
// Top-level metadata
// ============================================================================

export const topLevelMetaSchema = z.object({
	backend: z.enum(BACKEND_KINDS),
	version: z.string(),
	embed_model: z.string(),
	dimension: z.number().int().nonnegative(),
	count: z.number().int().nonnegative(),
	build_id: z.string().optional(),
});

export type TopLevelMeta = z.infer<typeof topLevelMetaSchema>;

export function getTopLevelMetaPath(indexDir: string): string {
	return path.join(indexDir, INDEX_LAYOUT.META_FILE);
}

export function readTopLevelMeta(
	indexDir: string,
): Promise<JsonReadResult<TopLevelMeta>> {
	return readJsonFile(getTopLevelMetaPath(indexDir), topLevelMetaSchema);
}

export async function writeTopLevelMeta(
	indexDir: string,
	meta: {
		backend: BackendKind;
		embedModel: string;
		dimension: number;
		count: number;
		buildId: string;
	},
): Promise<void> {
	const document: TopLevelMeta = {
		backend: meta.backend,
		version: INDEX_FORMAT_VERSION,
		embed_model: meta.embedModel,
		dimension: meta.dimension,
		count: meta.count,
		build_id: meta.buildId,
	};
	await writeJsonAtomic(getTopLevelMetaPath(indexDir), document);
}

/**
 * Decide whether a backend's persisted build is the one the top-level file
 * announces. A different build_id for the same backend means a save() is
 * between its two writes (or crashed there).
 */
export function checkBuildConsistency(
	topLevel: JsonReadResult<TopLevelMeta>,
	backend: BackendKind,
	backendBuildId: string,
): {consistent: true} | {consistent: false; reason: string} {
	if (topLevel.status === 'missing') {
		return {consistent: false, reason: 'top-level meta.json is missing'};
	}
	if (topLevel.status === 'corrupt') {
		return {consistent: false, reason: topLevel.reason};
	}
	const meta = topLevel.value;
	if (meta.backend === backend && meta.build_id !== backendBuildId) {
		return {
			consistent: false,
			reason: `index is being rebuilt (top-level build ${meta.build_id ?? '<none>'}, ${backend} build ${backendBuildId}); retry`,
		};
	}
	return {consistent: true};
}

// ============================================================================
// Persisted units
// ============================================================================

export const persistedUnitSchema = z.object({
	id: z.string(),
	name: z.string(),
	kind: z.enum(['function', 'class', 'method', 'module']),
	language: z.string(),
	file_path: z.string(),
	start_line: z.number().int(),
	end_line: z.number().int(),
	signature: z.string(),
	docstring_summary: z.string(),
	file_hash: z.string(),
});

export type PersistedUnit = z.infer<typeof persistedUnitSchema>;

export function unitToPersisted(unit: CodeUnit): PersistedUnit {
	return {
		id: unit.id,
		name: unit.name,
		kind: unit.kind,
		language: unit.language,
		file_path: unit.filePath,
		start_line: unit.startLine,
		end_line: unit.endLine,
		signature: unit.signature,
		docstring_summary: unit.docstringSummary,
		file_hash: unit.fileHash,
	};
}

export function persistedToUnit(row: PersistedUnit): CodeUnit {
	return {
		id: row.id,
		name: row.name,
		kind: row.kind,
		language: row.language,
		filePath: row.file_path,
		startLine: row.start_line,
		endLine: row.end_line,
		signature: row.signature,
		docstringSummary: row.docstring_summary,
		fileHash: row.file_hash,
	};
}

// ============================================================================
// Change detection
// ============================================================================

/**
 * Indices into the incoming unit list, plus ids that disappeared.
 */
export interface UnitPartition {
	added: number[];
	changed: number[];
	unchanged: number[];
	deletedIds: string[];
}

/**
 * Classify incoming units against the previously indexed ones by fileHash.
 */
export function partitionUnits(
	units: CodeUnit[],
	previous: ReadonlyMap<string, CodeUnit>,
): UnitPartition {
	const partition: UnitPartition = {
		added: [],
		changed: [],
		unchanged: [],
		deletedIds: [],
	};
	const incoming = new Set<string>();

	units.forEach((unit, index) => {
		incoming.add(unit.id);
		const prior = previous.get(unit.id);
		if (!prior) {
			partition.added.push(index);
		} else if (prior.fileHash !== unit.fileHash) {
			partition.changed.push(index);
		} else {
			partition.unchanged.push(index);
		}
	});

	for (const id of previous.keys()) {
		if (!incoming.has(id)) {
			partition.deletedIds.push(id);
		}
	}

	return partition;
}

/**
 * Reject inputs that would corrupt the id-to-vector mapping.
 */
export function validateBuildInput(units: CodeUnit[], texts: string[]): void {
	if (units.length !== texts.length) {
		throw new InvalidArgumentError(
			`build() received ${units.length} units but ${texts.length} texts`,
		);
	}
	const seen = new Set<string>();
	for (const unit of units) {
		if (seen.has(unit.id)) {
			throw new InvalidArgumentError(
				`Duplicate unit id ${unit.id} (${unit.filePath}:${unit.name})`,
			);
		}
		seen.add(unit.id);
	}
}

/**
 * Exact-name lookup: `name` itself, or a qualified name ending in `.name`.
 */
export function findUnitsByName(
	units: Iterable<CodeUnit>,
	name: string,
): CodeUnit[] {
	const suffix = `.${name}`;
	const exact: CodeUnit[] = [];
	const qualified: CodeUnit[] = [];
	for (const unit of units) {
		if (unit.name === name) {
			exact.push(unit);
		} else if (unit.name.endsWith(suffix)) {
			qualified.push(unit);
		}
	}
	return [...exact, ...qualified];
}
