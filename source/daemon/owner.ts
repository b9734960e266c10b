/**
 * Daemon Resource Owner
 *
 * Single owner of the daemon session's mutable state:
 * - one cached SearchBackend (so the encoder stays resident between requests)
 * - the lexical index shared by searches and builds
 * - indexing progress for status polling
 *
 * The cache is revalidated against the top-level build_id before each use,
 * so a build made by another process (the CLI, another daemon request that
 * switched backends) is picked up on the next request.
 */

import {loadConfig, type CodeloupeConfig} from './lib/config.js';
import {getIndexDir} from './lib/constants.js';
import {IndexNotFoundError} from './lib/errors.js';
import {createServiceLogger, type Logger} from './lib/logger.js';
import {Mutex} from './lib/mutex.js';
import {
	createBackend,
	probeBackends,
	resolveBackendKind,
	type BackendAvailability,
	type BackendFactoryOptions,
} from './services/backends/factory.js';
import {readTopLevelMeta} from './services/backends/metadata.js';
import type {BackendInfo, BackendKind, SearchBackend} from './services/backends/types.js';
import {
	buildIndex,
	searchIndex,
	type UnitSource,
} from './services/indexing.js';
import {LexicalIndex} from './services/lexical/index.js';
import {
	TypedEmitter,
	type IndexStats,
	type IndexingEvents,
	type SearchResult,
} from './services/types.js';
import {StateContainer, type IndexingState} from './state.js';

// ============================================================================
// Types
// ============================================================================

export interface DaemonIndexOptions {
	rebuild?: boolean;
	/** 'auto' or a backend kind; defaults to the configured preference */
	backend?: string;
	/** Index only this language's files */
	language?: string;
}

/**
 * Status response for clients.
 */
export interface DaemonStatus {
	projectRoot: string;
	indexed: boolean;
	/** Info of the loaded backend; null when nothing is indexed */
	index: BackendInfo | null;
	availability: Record<BackendKind, BackendAvailability>;
	indexing: IndexingState & {percent: number};
}

export interface DaemonOwnerOptions {
	config?: CodeloupeConfig;
	logger?: Logger;
	indexDir?: string;
	/** Injected into every backend the owner creates */
	factory?: Omit<BackendFactoryOptions, 'config' | 'logger' | 'indexDir' | 'lexical'>;
	extractor?: UnitSource;
}

// ============================================================================
// Daemon Owner
// ============================================================================

export class DaemonOwner {
	private readonly projectRoot: string;
	private readonly options: DaemonOwnerOptions;
	private config: CodeloupeConfig | null = null;
	private logger: Logger | null = null;
	private readonly indexDir: string;
	readonly state = new StateContainer();

	private backend: SearchBackend | null = null;
	private lexical: LexicalIndex | null = null;
	/** Top-level build_id the cached backend was last validated against */
	private cachedBuildId: string | null = null;
	private needsRevalidation = true;
	private readonly cacheMutex = new Mutex();

	constructor(projectRoot: string, options: DaemonOwnerOptions = {}) {
		this.projectRoot = projectRoot;
		this.options = options;
		this.indexDir = options.indexDir ?? getIndexDir(projectRoot);
	}

	// ==========================================================================
	// Lifecycle
	// ==========================================================================

	async initialize(): Promise<void> {
		this.config = this.options.config ?? (await loadConfig(this.projectRoot));
		this.logger = this.options.logger ?? createServiceLogger(this.projectRoot, 'daemon');
		this.lexical = new LexicalIndex(this.indexDir, this.logger);
		this.log('info', `Daemon initialized for ${this.projectRoot}`);
	}

	async shutdown(): Promise<void> {
		this.log('info', 'Daemon shutting down');
		await this.cacheMutex.runExclusive(async () => {
			if (this.backend) {
				await this.backend.close();
				this.backend = null;
			}
			this.cachedBuildId = null;
			this.needsRevalidation = true;
		});
		this.state.reset();
		this.log('info', 'Daemon shutdown complete');
	}

	// ==========================================================================
	// Backend cache
	// ==========================================================================

	private requireInitialized(): {config: CodeloupeConfig; logger: Logger; lexical: LexicalIndex} {
		if (!this.config || !this.logger || !this.lexical) {
			throw new Error('DaemonOwner not initialized. Call initialize() first.');
		}
		return {config: this.config, logger: this.logger, lexical: this.lexical};
	}

	/**
	 * Return the cached backend for `requested`, replacing or reloading it when
	 * the kind or the persisted build changed.
	 */
	private acquireBackend(requested: string): Promise<SearchBackend> {
		const {config, logger, lexical} = this.requireInitialized();

		return this.cacheMutex.runExclusive(async () => {
			const meta = await readTopLevelMeta(this.indexDir);
			const currentBuildId = meta.status === 'ok' ? (meta.value.build_id ?? null) : null;
			const kind = await resolveBackendKind(
				this.indexDir,
				requested,
				config,
				this.options.factory?.probes,
			);

			const cached = this.backend;
			if (
				cached &&
				cached.kind === kind &&
				!this.needsRevalidation &&
				this.cachedBuildId === currentBuildId
			) {
				return cached;
			}

			let backend = cached;
			if (backend && backend.kind !== kind) {
				this.log('info', `Switching backend ${backend.kind} -> ${kind}`);
				await backend.close();
				backend = null;
			}
			if (!backend) {
				backend = createBackend(kind, this.indexDir, {
					...this.options.factory,
					config,
					logger,
					lexical,
				});
			}
			this.backend = backend;

			if (currentBuildId !== null && backend.loadedBuildId() !== currentBuildId) {
				const loaded = await backend.load();
				this.log('debug', `Reloaded ${kind} index (loaded=${loaded})`);
			}
			if (currentBuildId !== this.cachedBuildId) {
				await lexical.load();
			}

			this.cachedBuildId = currentBuildId;
			this.needsRevalidation = false;
			return backend;
		});
	}

	// ==========================================================================
	// Operations
	// ==========================================================================

	async search(query: string, limit?: number): Promise<SearchResult[]> {
		const {config, logger, lexical} = this.requireInitialized();
		const meta = await readTopLevelMeta(this.indexDir);
		if (meta.status !== 'ok') {
			throw new IndexNotFoundError();
		}

		const backend = await this.acquireBackend('auto');
		return searchIndex(this.projectRoot, query, {
			backend,
			lexical,
			config,
			logger,
			indexDir: this.indexDir,
			limit,
		});
	}

	async index(options: DaemonIndexOptions = {}): Promise<IndexStats> {
		const {config, logger, lexical} = this.requireInitialized();
		const backend = await this.acquireBackend(options.backend ?? config.backend);

		const events = new TypedEmitter<IndexingEvents>();
		this.wireIndexingEvents(events);
		try {
			return await buildIndex(this.projectRoot, {
				backend,
				lexical,
				config,
				logger,
				indexDir: this.indexDir,
				rebuild: options.rebuild ?? false,
				language: options.language,
				extractor: this.options.extractor,
				events,
			});
		} finally {
			// The persisted build changed; the next request revalidates
			this.needsRevalidation = true;
			events.removeAllListeners();
		}
	}

	async getStatus(): Promise<DaemonStatus> {
		const {config} = this.requireInitialized();
		const meta = await readTopLevelMeta(this.indexDir);
		const indexed = meta.status === 'ok';

		let index: BackendInfo | null = null;
		if (indexed) {
			const backend = await this.acquireBackend('auto');
			index = backend.loadedBuildId() === null ? null : backend.info();
		}

		const indexing = this.state.getSnapshot().indexing;
		return {
			projectRoot: this.projectRoot,
			indexed,
			index,
			availability: probeBackends(config, this.options.factory?.probes),
			indexing: {
				...indexing,
				percent:
					indexing.total > 0 ? Math.round((indexing.current / indexing.total) * 100) : 0,
			},
		};
	}

	getProjectRoot(): string {
		return this.projectRoot;
	}

	getConfig(): CodeloupeConfig | null {
		return this.config;
	}

	getLogger(): Logger | null {
		return this.logger;
	}

	// ==========================================================================
	// Event Wiring
	// ==========================================================================

	private wireIndexingEvents(events: TypedEmitter<IndexingEvents>): void {
		events.on('start', () => {
			this.state.updateNested('indexing', () => ({
				status: 'indexing' as const,
				phase: null,
				current: 0,
				total: 0,
				stage: '',
				error: null,
			}));
		});

		events.on('progress', ({phase, current, total, stage}) => {
			this.state.updateNested('indexing', () => ({phase, current, total, stage}));
		});

		events.on('complete', ({stats}) => {
			this.state.updateNested('indexing', () => ({
				status: 'complete' as const,
				lastCompleted: new Date().toISOString(),
				lastStats: stats,
			}));
		});

		events.on('error', ({error}) => {
			this.state.updateNested('indexing', () => ({
				status: 'error' as const,
				error: error.message,
			}));
		});
	}

	private log(level: 'debug' | 'info' | 'warn' | 'error', message: string): void {
		this.logger?.[level]('Daemon', message);
	}
}
