/**
 * codeloupe - semantic code search over single-vector and multi-vector
 * (late-interaction) indexes.
 *
 * Library entry: the orchestrator, the backends behind the factory, and the
 * daemon client.
 */

export {
	buildIndex,
	buildEmbedText,
	getIndexInfo,
	searchIndex,
	type BuildIndexOptions,
	type SearchOptions,
	type ServiceOptions,
	type UnitSource,
} from './daemon/services/indexing.js';

export {
	createBackend,
	getBackend,
	probeBackends,
	resolveBackendKind,
	type BackendAvailability,
	type BackendFactoryOptions,
	type BackendProbes,
} from './daemon/services/backends/factory.js';

export {
	BACKEND_KINDS,
	type BackendInfo,
	type BackendKind,
	type BackendRequest,
	type BackendStats,
	type LexicalRanker,
	type SearchBackend,
} from './daemon/services/backends/types.js';

export {SingleVectorBackend} from './daemon/services/backends/single-vector/index.js';
export {MultiVectorBackend} from './daemon/services/backends/multi-vector/index.js';
export {LexicalIndex, tokenizeForBm25} from './daemon/services/lexical/index.js';
export {UnitExtractor, SUPPORTED_LANGUAGES} from './daemon/lib/extract/index.js';

export {
	TypedEmitter,
	type CodeUnit,
	type IndexStats,
	type IndexingEvents,
	type SearchResult,
	type UnitKind,
} from './daemon/services/types.js';

export type {EmbeddingProvider, TokenEncoder} from './daemon/providers/types.js';

export {
	DEFAULT_CONFIG,
	loadConfig,
	saveConfig,
	type CodeloupeConfig,
	type MultiVectorConfig,
} from './daemon/lib/config.js';

export {
	BuildInProgressError,
	DependencyMissingError,
	EmbeddingMismatchError,
	IndexNotFoundError,
	InvalidArgumentError,
	InvalidBackendError,
	SearchError,
	TimeoutError,
} from './daemon/lib/errors.js';

export {createConsoleLogger, createNullLogger, type Logger} from './daemon/lib/logger.js';

export {DaemonClient} from './client/index.js';
