/**
 * Backend selection.
 *
 * The only place that knows the concrete backend classes. Availability is
 * decided by resolving packages, never by constructing a backend, so an
 * `auto` request stays cheap.
 */

import {createRequire} from 'node:module';
import type {CodeloupeConfig} from '../../lib/config.js';
import {getIndexDir} from '../../lib/constants.js';
import {DependencyMissingError, InvalidBackendError} from '../../lib/errors.js';
import type {Logger} from '../../lib/logger.js';
import {createEmbeddingProvider, createTokenEncoder} from '../../providers/index.js';
import type {EmbeddingProvider, TokenEncoder} from '../../providers/types.js';
import {LexicalIndex} from '../lexical/index.js';
import {readTopLevelMeta} from './metadata.js';
import {MultiVectorBackend} from './multi-vector/index.js';
import {SingleVectorBackend} from './single-vector/index.js';
import {
	BACKEND_KINDS,
	isBackendKind,
	type BackendKind,
	type LexicalRanker,
	type SearchBackend,
} from './types.js';

const require = createRequire(import.meta.url);

export const MULTI_VECTOR_PACKAGE = '@huggingface/transformers';
export const LOCAL_EMBEDDING_PACKAGE = 'fastembed';

/**
 * Package resolution checks. Injectable so tests control availability.
 */
export interface BackendProbes {
	canResolve(packageName: string): boolean;
}

export const defaultProbes: BackendProbes = {
	canResolve(packageName) {
		for (const specifier of [packageName, `${packageName}/package.json`]) {
			try {
				require.resolve(specifier);
				return true;
			} catch {
				// Try the next specifier
			}
		}
		return false;
	},
};

export interface BackendAvailability {
	available: boolean;
	/** Packages to install when unavailable */
	packages: string[];
}

/**
 * Report which backends could be constructed right now.
 */
export function probeBackends(
	config: CodeloupeConfig,
	probes: BackendProbes = defaultProbes,
): Record<BackendKind, BackendAvailability> {
	const singleNeedsPackage = config.embeddingProvider === 'local';
	return {
		'single-vector': {
			available:
				!singleNeedsPackage || probes.canResolve(LOCAL_EMBEDDING_PACKAGE),
			packages: singleNeedsPackage ? [LOCAL_EMBEDDING_PACKAGE] : [],
		},
		'multi-vector': {
			available: probes.canResolve(MULTI_VECTOR_PACKAGE),
			packages: [MULTI_VECTOR_PACKAGE],
		},
	};
}

export interface BackendFactoryOptions {
	config: CodeloupeConfig;
	logger: Logger;
	/** Defaults to the project's index dir under the codeloupe home */
	indexDir?: string;
	probes?: BackendProbes;
	createEmbedder?: (config: CodeloupeConfig, logger: Logger) => EmbeddingProvider;
	createEncoder?: (config: CodeloupeConfig, logger: Logger) => TokenEncoder;
	/** BM25 ranker for single-vector fusion; defaults to the project's lexical index */
	lexical?: LexicalRanker | null;
}

/**
 * Resolve `requested` to a backend kind without constructing anything.
 */
export async function resolveBackendKind(
	indexDir: string,
	requested: string,
	config: CodeloupeConfig,
	probes: BackendProbes = defaultProbes,
): Promise<BackendKind> {
	const availability = probeBackends(config, probes);

	if (requested !== 'auto') {
		if (!isBackendKind(requested)) {
			throw new InvalidBackendError(requested, [...BACKEND_KINDS, 'auto']);
		}
		const probe = availability[requested];
		if (!probe.available) {
			throw new DependencyMissingError(`The ${requested} backend`, probe.packages);
		}
		return requested;
	}

	const existing = await readTopLevelMeta(indexDir);
	if (existing.status === 'ok') {
		const recorded = existing.value.backend;
		if (!availability[recorded].available) {
			throw new DependencyMissingError(
				`The existing ${recorded} index`,
				availability[recorded].packages,
			);
		}
		return recorded;
	}

	if (availability['multi-vector'].available) return 'multi-vector';
	if (availability['single-vector'].available) return 'single-vector';

	throw new DependencyMissingError('Semantic search', [
		MULTI_VECTOR_PACKAGE,
		...availability['single-vector'].packages,
	]);
}

/**
 * Construct the backend for `requested` ('auto' or a backend kind).
 */
export async function getBackend(
	projectRoot: string,
	requested: string,
	options: BackendFactoryOptions,
): Promise<SearchBackend> {
	const indexDir = options.indexDir ?? getIndexDir(projectRoot);
	const kind = await resolveBackendKind(
		indexDir,
		requested,
		options.config,
		options.probes,
	);
	return createBackend(kind, indexDir, options);
}

export function createBackend(
	kind: BackendKind,
	indexDir: string,
	options: BackendFactoryOptions,
): SearchBackend {
	const {config, logger} = options;
	switch (kind) {
		case 'single-vector': {
			const embedder = (options.createEmbedder ?? createEmbeddingProvider)(config, logger);
			const lexical =
				options.lexical === undefined
					? new LexicalIndex(indexDir, logger)
					: options.lexical ?? undefined;
			return new SingleVectorBackend({indexDir, logger, embedder, lexical});
		}
		case 'multi-vector': {
			const encoder = (options.createEncoder ?? createTokenEncoder)(config, logger);
			return new MultiVectorBackend({
				indexDir,
				logger,
				encoder,
				tuning: config.multiVector,
			});
		}
	}
}
