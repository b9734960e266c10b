/**
 * Client Types
 *
 * Types for daemon client communication.
 */

import type {IndexingPhase, IndexStats, SearchResult} from '../daemon/services/types.js';
import type {DaemonIndexOptions, DaemonStatus} from '../daemon/owner.js';
import type {IndexingStatus} from '../daemon/state.js';

export type {IndexStats, SearchResult, DaemonStatus};

// ============================================================================
// Client Configuration
// ============================================================================

export interface DaemonClientOptions {
	projectRoot: string;
	/** Defaults to the project's socket under the codeloupe run dir */
	socketPath?: string;
	/** Connection timeout in ms (default: 5000) */
	connectTimeout?: number;
	/** Per-request timeout in ms; index requests get `indexTimeout` */
	requestTimeout?: number;
	/** Timeout for index requests (default: 30 minutes) */
	indexTimeout?: number;
}

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

// ============================================================================
// API Types
// ============================================================================

export type ClientIndexOptions = DaemonIndexOptions;

export interface PingResponse {
	pong: boolean;
	timestamp: number;
	protocolVersion: number;
}

export interface IndexProgressEvent {
	status: IndexingStatus;
	phase: IndexingPhase | null;
	current: number;
	total: number;
	stage: string;
}
