/**
 * Daemon IPC Server
 *
 * Unix socket server for JSON-RPC 2.0 communication.
 * Handles client connections and request routing.
 */

import * as net from 'node:net';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import {isNotFound} from './lib/atomic.js';
import type {Logger} from './lib/logger.js';
import {
	type JsonRpcRequest,
	parseRequest,
	formatResponse,
	formatError,
	formatNotification,
	ErrorCodes,
	MessageBuffer,
	JsonRpcParseError,
	toJsonRpcError,
} from './protocol.js';
import type {DaemonOwner} from './owner.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Handler context passed to each method handler.
 */
export interface HandlerContext {
	owner: DaemonOwner;
	server: DaemonServer;
	clientId: string;
}

export type Handler = (
	params: Record<string, unknown> | undefined,
	ctx: HandlerContext,
) => Promise<unknown>;

export type HandlerRegistry = Record<string, Handler>;

export interface DaemonServerOptions {
	socketPath: string;
	pidPath: string;
	logger?: Logger;
}

// ============================================================================
// Daemon Server
// ============================================================================

export class DaemonServer {
	private readonly socketPath: string;
	private readonly pidPath: string;
	private readonly owner: DaemonOwner;
	private readonly logger: Logger | undefined;
	private handlers: HandlerRegistry = {};

	private server: net.Server | null = null;
	private clients: Map<string, net.Socket> = new Map();
	private messageBuffers: Map<string, MessageBuffer> = new Map();
	private nextClientId = 1;

	// Callbacks for lifecycle events
	onClientConnect?: (clientId: string) => void;
	onClientDisconnect?: (clientId: string, remainingCount: number) => void;
	/** Called on each request for activity-based timeout */
	onActivity?: () => void;
	/** Full process shutdown; defaults to stopping the server */
	onShutdownRequested?: () => Promise<void>;

	constructor(owner: DaemonOwner, options: DaemonServerOptions) {
		this.owner = owner;
		this.socketPath = options.socketPath;
		this.pidPath = options.pidPath;
		this.logger = options.logger;
	}

	setHandlers(handlers: HandlerRegistry): void {
		this.handlers = handlers;
	}

	/**
	 * Check if a socket is connectable (live daemon responding).
	 */
	private isSocketLive(socketPath: string, timeout = 1000): Promise<boolean> {
		return new Promise(resolve => {
			const socket = net.createConnection(socketPath);

			const timer = setTimeout(() => {
				socket.destroy();
				resolve(false);
			}, timeout);

			socket.on('connect', () => {
				clearTimeout(timer);
				socket.destroy();
				resolve(true);
			});

			socket.on('error', () => {
				clearTimeout(timer);
				resolve(false);
			});
		});
	}

	async start(): Promise<void> {
		await fs.mkdir(path.dirname(this.pidPath), {recursive: true});
		await fs.mkdir(path.dirname(this.socketPath), {recursive: true});

		// We hold the daemon lock here, so an existing socket file is stale
		// unless something still answers on it
		try {
			await fs.access(this.socketPath);
			if (await this.isSocketLive(this.socketPath)) {
				throw new Error(
					'Socket is still connectable - another daemon may be running despite lock',
				);
			}
			await fs.unlink(this.socketPath);
			this.logger?.info('DaemonServer', 'Cleaned up stale socket file');
		} catch (error) {
			if (!isNotFound(error)) throw error;
		}

		await fs.writeFile(this.pidPath, String(process.pid));

		const server = net.createServer(socket => this.handleConnection(socket));
		await new Promise<void>((resolve, reject) => {
			server.on('error', reject);
			server.listen(this.socketPath, () => {
				server.removeListener('error', reject);
				resolve();
			});
		});
		this.server = server;

		this.logger?.info('DaemonServer', `Listening on ${this.socketPath}`);
	}

	async stop(): Promise<void> {
		for (const socket of this.clients.values()) {
			socket.destroy();
		}
		this.clients.clear();
		this.messageBuffers.clear();

		const server = this.server;
		if (server) {
			await new Promise<void>(resolve => {
				server.close(() => resolve());
			});
			this.server = null;
		}

		for (const file of [this.socketPath, this.pidPath]) {
			await fs.rm(file, {force: true});
		}

		this.logger?.info('DaemonServer', 'Server stopped');
	}

	/**
	 * Shut down on behalf of a client request. Never rejects.
	 */
	async requestShutdown(): Promise<void> {
		try {
			await (this.onShutdownRequested ?? (() => this.stop()))();
		} catch (error) {
			this.logger?.error(
				'DaemonServer',
				'Shutdown failed',
				error instanceof Error ? error : new Error(String(error)),
			);
		}
	}

	getClientCount(): number {
		return this.clients.size;
	}

	/**
	 * Push a JSON-RPC notification to one client, if still connected.
	 */
	notify(clientId: string, method: string, params: Record<string, unknown>): void {
		const socket = this.clients.get(clientId);
		if (socket && !socket.destroyed) {
			socket.write(formatNotification(method, params));
		}
	}

	private handleConnection(socket: net.Socket): void {
		const clientId = `client-${this.nextClientId++}`;

		this.clients.set(clientId, socket);
		this.messageBuffers.set(clientId, new MessageBuffer());

		this.logger?.debug('DaemonServer', `Client connected: ${clientId}`);
		this.onClientConnect?.(clientId);

		socket.on('data', data => {
			this.handleData(clientId, socket, data);
		});

		socket.on('close', () => {
			this.handleDisconnect(clientId);
		});

		socket.on('error', error => {
			this.logger?.warn('DaemonServer', `Socket error for ${clientId}`, {
				error: error.message,
			});
			this.handleDisconnect(clientId);
		});
	}

	private handleData(clientId: string, socket: net.Socket, data: Buffer): void {
		const buffer = this.messageBuffers.get(clientId);
		if (!buffer) return;

		for (const message of buffer.append(data.toString())) {
			void this.handleMessage(clientId, socket, message);
		}
	}

	/**
	 * Handle a single JSON-RPC message. Never rejects: every failure becomes
	 * an error response.
	 */
	private async handleMessage(
		clientId: string,
		socket: net.Socket,
		message: string,
	): Promise<void> {
		this.onActivity?.();

		let request: JsonRpcRequest;
		try {
			request = parseRequest(message);
		} catch (error) {
			const text = error instanceof JsonRpcParseError ? error.message : 'Parse error';
			write(socket, formatError(null, ErrorCodes.PARSE_ERROR, text));
			return;
		}

		const handler = Object.hasOwn(this.handlers, request.method)
			? this.handlers[request.method]
			: undefined;
		if (!handler) {
			write(
				socket,
				formatError(
					request.id,
					ErrorCodes.METHOD_NOT_FOUND,
					`Method not found: ${request.method}`,
				),
			);
			return;
		}

		try {
			const result = await handler(request.params, {
				owner: this.owner,
				server: this,
				clientId,
			});
			write(socket, formatResponse(request.id, result));
		} catch (error) {
			const mapped = toJsonRpcError(error);
			if (mapped.code === ErrorCodes.INTERNAL_ERROR) {
				this.logger?.error(
					'DaemonServer',
					`Handler error: ${request.method}`,
					error instanceof Error ? error : new Error(mapped.message),
				);
			} else {
				this.logger?.info('DaemonServer', `${request.method}: ${mapped.message}`);
			}
			write(socket, formatError(request.id, mapped.code, mapped.message, mapped.data));
		}
	}

	private handleDisconnect(clientId: string): void {
		if (!this.clients.delete(clientId)) return;
		this.messageBuffers.delete(clientId);

		const remaining = this.clients.size;
		this.logger?.debug(
			'DaemonServer',
			`Client disconnected: ${clientId} (${remaining} remaining)`,
		);
		this.onClientDisconnect?.(clientId, remaining);
	}
}

function write(socket: net.Socket, payload: string): void {
	if (!socket.destroyed) {
		socket.write(payload);
	}
}
