/**
 * Indexing Service - Orchestrates extraction, embedding, and persistence.
 *
 * Pipeline:
 * 1. Extract code units with tree-sitter
 * 2. Render each unit as labelled embedding text
 * 3. Resolve the backend (or use the injected one)
 * 4. build() then save()
 * 5. Rebuild the lexical index over all units
 *
 * Emits events for progress; the daemon and CLI subscribe.
 */

import {loadConfig, type CodeloupeConfig} from '../lib/config.js';
import {getIndexDir} from '../lib/constants.js';
import {IndexNotFoundError} from '../lib/errors.js';
import {UnitExtractor, type ExtractOptions, type ExtractionResult} from '../lib/extract/index.js';
import {createServiceLogger, type Logger} from '../lib/logger.js';
import {Mutex} from '../lib/mutex.js';
import {getBackend, type BackendFactoryOptions} from './backends/factory.js';
import {readTopLevelMeta} from './backends/metadata.js';
import type {BackendInfo, SearchBackend} from './backends/types.js';
import {LexicalIndex} from './lexical/index.js';
import {IDENTIFIER_QUERY} from './search/fusion.js';
import {
	TypedEmitter,
	toSearchResult,
	type CodeUnit,
	type IndexStats,
	type IndexingEvents,
	type SearchResult,
} from './types.js';

// ============================================================================
// Embedding Text
// ============================================================================

const MAX_DOC_CHARS = 800;
const MAX_PATH_PARTS = 3;

/**
 * Labelled text a unit is embedded as.
 *
 * ```
 * Language: python
 * Kind: function
 * Name: verify_token
 * Signature: def verify_token(token: str) -> Optional[str]
 * Doc: Verify a token and return the user id.
 * File: auth/tokens.py
 * ```
 */
export function buildEmbedText(unit: CodeUnit): string {
	let doc = unit.docstringSummary.trim().replace(/\s+/g, ' ');
	if (doc.length > MAX_DOC_CHARS) {
		doc = doc.slice(0, MAX_DOC_CHARS) + '…';
	}

	const parts = [
		`Language: ${unit.language}`,
		`Kind: ${unit.kind}`,
		`Name: ${unit.name}`,
		`Signature: ${unit.signature}`,
	];
	if (doc) {
		parts.push(`Doc: ${doc}`);
	}
	parts.push(`File: ${unit.filePath.split('/').slice(-MAX_PATH_PARTS).join('/')}`);
	return parts.join('\n');
}

// ============================================================================
// Options
// ============================================================================

/**
 * Anything that can produce units for a project. UnitExtractor in production.
 */
export interface UnitSource {
	extract(projectRoot: string, options?: ExtractOptions): Promise<ExtractionResult>;
	close(): void;
}

/**
 * Shared collaborators. Anything injected is left open for the caller.
 */
export interface ServiceOptions {
	config?: CodeloupeConfig;
	logger?: Logger;
	/** Defaults to the project's index dir under the codeloupe home */
	indexDir?: string;
	backend?: SearchBackend;
	lexical?: LexicalIndex;
	/** Passed through to the backend factory */
	factory?: Omit<BackendFactoryOptions, 'config' | 'logger' | 'indexDir' | 'lexical'>;
}

export interface BuildIndexOptions extends ServiceOptions {
	/** Re-embed everything instead of reusing unchanged units */
	rebuild?: boolean;
	/** 'auto' or a backend kind; defaults to the configured preference */
	backendKind?: string;
	language?: string;
	extractor?: UnitSource;
	events?: TypedEmitter<IndexingEvents>;
}

export interface SearchOptions extends ServiceOptions {
	limit?: number;
}

// ============================================================================
// Build
// ============================================================================

/**
 * One build per project at a time within this process. Separate processes
 * are kept apart by the backend's build lock.
 */
const projectMutexes = new Map<string, Mutex>();

function getProjectMutex(indexDir: string): Mutex {
	let mutex = projectMutexes.get(indexDir);
	if (!mutex) {
		mutex = new Mutex();
		projectMutexes.set(indexDir, mutex);
	}
	return mutex;
}

interface Resolved {
	config: CodeloupeConfig;
	logger: Logger;
	indexDir: string;
	lexical: LexicalIndex;
}

async function resolveServices(
	projectRoot: string,
	options: ServiceOptions,
	service: 'indexer' | 'cli',
): Promise<Resolved> {
	const config = options.config ?? (await loadConfig(projectRoot));
	const logger = options.logger ?? createServiceLogger(projectRoot, service);
	const indexDir = options.indexDir ?? getIndexDir(projectRoot);
	const lexical = options.lexical ?? new LexicalIndex(indexDir, logger);
	return {config, logger, indexDir, lexical};
}

async function openBackend(
	projectRoot: string,
	requested: string,
	options: ServiceOptions,
	resolved: Resolved,
): Promise<SearchBackend> {
	if (options.backend) return options.backend;
	return getBackend(projectRoot, requested, {
		...options.factory,
		config: resolved.config,
		logger: resolved.logger,
		indexDir: resolved.indexDir,
		lexical: resolved.lexical,
	});
}

/**
 * Extract, embed and persist the project's index.
 */
export async function buildIndex(
	projectRoot: string,
	options: BuildIndexOptions = {},
): Promise<IndexStats> {
	const resolved = await resolveServices(projectRoot, options, 'indexer');
	return getProjectMutex(resolved.indexDir).runExclusive(() =>
		runBuild(projectRoot, options, resolved),
	);
}

async function runBuild(
	projectRoot: string,
	options: BuildIndexOptions,
	resolved: Resolved,
): Promise<IndexStats> {
	const {config, logger, lexical} = resolved;
	const events = options.events;
	const startedAt = Date.now();
	const extractor = options.extractor ?? new UnitExtractor(logger);
	let backend: SearchBackend | null = null;

	events?.emit('start');
	try {
		events?.emit('progress', {phase: 'scan', current: 0, total: 0, stage: 'Scanning files'});
		const {units, totalFiles} = await extractor.extract(projectRoot, {
			extensions: config.extensions,
			language: options.language,
			onProgress: (current, total) =>
				events?.emit('progress', {
					phase: 'extract',
					current,
					total,
					stage: 'Extracting units',
				}),
		});
		logger.info('Indexer', 'Extracted units', {files: totalFiles, units: units.length});

		const texts = units.map(buildEmbedText);
		backend = await openBackend(
			projectRoot,
			options.backendKind ?? config.backend,
			options,
			resolved,
		);

		events?.emit('progress', {
			phase: 'embed',
			current: 0,
			total: units.length,
			stage: `Embedding with ${backend.kind}`,
		});
		const stats = await backend.build(units, texts, options.rebuild ?? false);

		events?.emit('progress', {phase: 'persist', current: 0, total: 0, stage: 'Saving index'});
		await backend.save();

		events?.emit('progress', {
			phase: 'lexical',
			current: 0,
			total: units.length,
			stage: 'Rebuilding lexical index',
		});
		await lexical.rebuild(units);

		const result: IndexStats = {
			...stats,
			totalFiles,
			totalUnits: units.length,
			durationMs: Date.now() - startedAt,
		};
		logger.info('Indexer', 'Index build complete', result);
		events?.emit('complete', {stats: result});
		return result;
	} catch (error) {
		const err = error instanceof Error ? error : new Error(String(error));
		logger.error('Indexer', 'Index build failed', err);
		// EventEmitter throws on an unobserved 'error'
		if (events && events.listenerCount('error') > 0) {
			events.emit('error', {error: err});
		}
		throw err;
	} finally {
		if (backend && !options.backend) {
			await backend.close();
		}
		if (!options.extractor) {
			extractor.close();
		}
	}
}

// ============================================================================
// Search
// ============================================================================

/**
 * Search the project's index.
 *
 * Identifier-like queries take exact name matches first (score 1.0) and fill
 * the remaining slots from the backend; anything else goes straight to the
 * backend.
 */
export async function searchIndex(
	projectRoot: string,
	query: string,
	options: SearchOptions = {},
): Promise<SearchResult[]> {
	const limit = options.limit ?? 10;
	const resolved = await resolveServices(projectRoot, options, 'cli');
	if (!options.backend) {
		const meta = await readTopLevelMeta(resolved.indexDir);
		if (meta.status !== 'ok') throw new IndexNotFoundError();
	}
	const backend = await openBackend(projectRoot, 'auto', options, resolved);

	try {
		if (backend.loadedBuildId() === null && !(await backend.load())) {
			throw new IndexNotFoundError();
		}
		if (limit <= 0) return [];

		const trimmed = query.trim();
		const exact: CodeUnit[] = [];
		if (IDENTIFIER_QUERY.test(trimmed)) {
			const lexical = resolved.lexical;
			if (!lexical.loaded) {
				await lexical.load();
			}
			const matches = lexical.findByName(trimmed) ?? backend.lookupByName(trimmed) ?? [];
			exact.push(...matches.slice(0, limit));
		}

		const results = exact.map(unit => toSearchResult(unit, 1.0));
		const remaining = limit - results.length;
		if (remaining <= 0) return results;

		const exactIds = new Set(exact.map(unit => unit.id));
		const semantic = await backend.search(query, remaining + exact.length);
		for (const hit of semantic) {
			if (results.length >= limit) break;
			if (!exactIds.has(hit.unitId)) {
				results.push(hit);
			}
		}
		return results;
	} finally {
		if (!options.backend) {
			await backend.close();
		}
	}
}

// ============================================================================
// Info
// ============================================================================

/**
 * Info of the project's active backend, or null when nothing was ever built.
 */
export async function getIndexInfo(
	projectRoot: string,
	options: ServiceOptions = {},
): Promise<BackendInfo | null> {
	const resolved = await resolveServices(projectRoot, options, 'cli');
	if (!options.backend) {
		const meta = await readTopLevelMeta(resolved.indexDir);
		if (meta.status !== 'ok') return null;
	}

	const backend = await openBackend(projectRoot, 'auto', options, resolved);
	try {
		if (backend.loadedBuildId() === null && !(await backend.load())) {
			return null;
		}
		return backend.info();
	} finally {
		if (!options.backend) {
			await backend.close();
		}
	}
}
