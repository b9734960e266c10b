/**
 * Daemon Client
 *
 * High-level client for daemon communication: typed method wrappers over a
 * DaemonConnection, with per-request timeouts. Responses are validated
 * before they reach callers.
 */

import {EventEmitter} from 'node:events';
import {z} from 'zod';
import {getDaemonSocketPath} from '../daemon/lib/constants.js';
import {DaemonConnection, REQUEST_TIMEOUT_MS} from './connection.js';
import {ensureDaemonRunning, isDaemonRunning} from './auto-start.js';
import type {
	ClientIndexOptions,
	ConnectionState,
	DaemonClientOptions,
	IndexProgressEvent,
	IndexStats,
	PingResponse,
	SearchResult,
} from './types.js';

export {DaemonRequestError} from './connection.js';
export {ensureDaemonRunning, isDaemonRunning} from './auto-start.js';
export type * from './types.js';

// ============================================================================
// Response Schemas
// ============================================================================

const unitKindSchema = z.enum(['function', 'class', 'method', 'module']);
const backendKindSchema = z.enum(['single-vector', 'multi-vector']);
const phaseSchema = z.enum(['scan', 'extract', 'embed', 'persist', 'lexical']);

const searchResultSchema = z.object({
	unitId: z.string(),
	score: z.number(),
	name: z.string(),
	kind: unitKindSchema,
	filePath: z.string(),
	line: z.number(),
	signature: z.string(),
});

const indexStatsSchema = z.object({
	backend: z.string(),
	embedModel: z.string(),
	totalFiles: z.number(),
	totalUnits: z.number(),
	new: z.number(),
	updated: z.number(),
	unchanged: z.number(),
	deleted: z.number(),
	fullRebuild: z.boolean(),
	forcedRebuild: z.boolean(),
	durationMs: z.number(),
});

const pingSchema = z.object({
	pong: z.boolean(),
	timestamp: z.number(),
	protocolVersion: z.number(),
});

const availabilitySchema = z.object({available: z.boolean(), packages: z.array(z.string())});

const statusSchema = z.object({
	projectRoot: z.string(),
	indexed: z.boolean(),
	index: z
		.object({
			backend: backendKindSchema,
			embedModel: z.string(),
			dimension: z.number().nullable(),
			count: z.number(),
			indexPath: z.string(),
			extra: z.record(z.string(), z.unknown()),
		})
		.nullable(),
	availability: z.object({
		'single-vector': availabilitySchema,
		'multi-vector': availabilitySchema,
	}),
	indexing: z.object({
		status: z.enum(['idle', 'indexing', 'complete', 'error']),
		phase: phaseSchema.nullable(),
		current: z.number(),
		total: z.number(),
		stage: z.string(),
		error: z.string().nullable(),
		lastCompleted: z.string().nullable(),
		lastStats: indexStatsSchema.nullable(),
		percent: z.number(),
	}),
});

export type ClientStatus = z.infer<typeof statusSchema>;

const progressSchema = z.object({
	status: z.enum(['idle', 'indexing', 'complete', 'error']),
	phase: phaseSchema.nullable(),
	current: z.number(),
	total: z.number(),
	stage: z.string(),
});

// ============================================================================
// DaemonClient
// ============================================================================

const INDEX_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Client for the codeloupe daemon.
 *
 * Events:
 * - 'indexProgress': progress of an index request (IndexProgressEvent)
 * - 'disconnect': connection lost (reason: string)
 */
export class DaemonClient extends EventEmitter {
	private readonly projectRoot: string;
	private readonly socketPath: string;
	private readonly connectTimeout: number;
	private readonly requestTimeout: number;
	private readonly indexTimeout: number;

	private connection: DaemonConnection | null = null;
	private state: ConnectionState = 'disconnected';

	constructor(options: DaemonClientOptions | string) {
		super();
		const resolved = typeof options === 'string' ? {projectRoot: options} : options;
		this.projectRoot = resolved.projectRoot;
		this.socketPath = resolved.socketPath ?? getDaemonSocketPath(this.projectRoot);
		this.connectTimeout = resolved.connectTimeout ?? 5000;
		this.requestTimeout = resolved.requestTimeout ?? REQUEST_TIMEOUT_MS;
		this.indexTimeout = resolved.indexTimeout ?? INDEX_TIMEOUT_MS;
	}

	// ==========================================================================
	// Connection Management
	// ==========================================================================

	getState(): ConnectionState {
		return this.state;
	}

	isConnected(): boolean {
		return this.state === 'connected' && this.connection?.isConnected() === true;
	}

	/**
	 * Connect to a running daemon. Does not start one.
	 */
	async connect(): Promise<void> {
		if (this.isConnected()) return;
		this.state = 'connecting';

		const connection = new DaemonConnection(this.socketPath);
		connection.on('disconnect', (reason: string) => {
			this.state = 'disconnected';
			this.emit('disconnect', reason);
		});
		connection.on('notification', (method: string, params: unknown) => {
			this.handleNotification(method, params);
		});

		try {
			await connection.connect(this.connectTimeout);
		} catch (error) {
			this.state = 'disconnected';
			throw error;
		}
		this.connection = connection;
		this.state = 'connected';
	}

	/**
	 * Start the daemon if needed, then connect.
	 */
	async connectOrStart(): Promise<void> {
		await ensureDaemonRunning(this.projectRoot);
		await this.connect();
	}

	async disconnect(): Promise<void> {
		this.state = 'disconnected';
		if (this.connection) {
			this.connection.disconnect();
			this.connection = null;
		}
	}

	/**
	 * Whether a daemon is serving this project (without connecting).
	 */
	isRunning(): Promise<boolean> {
		return isDaemonRunning(this.projectRoot);
	}

	// ==========================================================================
	// API Methods
	// ==========================================================================

	async ping(): Promise<PingResponse> {
		return pingSchema.parse(await this.request('ping'));
	}

	async search(query: string, limit?: number): Promise<SearchResult[]> {
		const params: Record<string, unknown> = {query};
		if (limit !== undefined) params['limit'] = limit;
		return z.array(searchResultSchema).parse(await this.request('search', params));
	}

	async index(options: ClientIndexOptions = {}): Promise<IndexStats> {
		const params: Record<string, unknown> = {};
		if (options.rebuild !== undefined) params['rebuild'] = options.rebuild;
		if (options.backend !== undefined) params['backend'] = options.backend;
		if (options.language !== undefined) params['language'] = options.language;
		return indexStatsSchema.parse(await this.request('index', params, this.indexTimeout));
	}

	async status(): Promise<ClientStatus> {
		return statusSchema.parse(await this.request('status'));
	}

	async shutdown(reason?: string): Promise<void> {
		await this.request('shutdown', reason === undefined ? {} : {reason});
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	private async request(
		method: string,
		params?: Record<string, unknown>,
		timeout: number = this.requestTimeout,
	): Promise<unknown> {
		const connection = this.connection;
		if (!connection || !this.isConnected()) {
			throw new Error('Not connected to daemon');
		}
		return connection.request(method, params, timeout);
	}

	private handleNotification(method: string, params: unknown): void {
		if (method !== 'indexProgress') return;
		const parsed = progressSchema.safeParse(params);
		if (parsed.success) {
			const event: IndexProgressEvent = parsed.data;
			this.emit('indexProgress', event);
		}
	}
}
