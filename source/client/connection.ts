/**
 * Daemon Connection Manager
 *
 * Low-level socket connection with message buffering and request/response
 * handling.
 */

import * as net from 'node:net';
import {EventEmitter} from 'node:events';
import {z} from 'zod';
import {MessageBuffer} from '../daemon/protocol.js';

// ============================================================================
// Types
// ============================================================================

interface PendingRequest {
	method: string;
	resolve: (result: unknown) => void;
	reject: (error: Error) => void;
	timer: ReturnType<typeof setTimeout>;
}

const jsonRpcMessageSchema = z.object({
	jsonrpc: z.literal('2.0'),
	id: z.union([z.number(), z.string(), z.null()]).optional(),
	method: z.string().optional(),
	result: z.unknown().optional(),
	error: z
		.object({
			code: z.number(),
			message: z.string(),
			data: z.unknown().optional(),
		})
		.optional(),
	params: z.record(z.string(), z.unknown()).optional(),
});

type JsonRpcMessage = z.infer<typeof jsonRpcMessageSchema>;

/**
 * An error response from the daemon, with its JSON-RPC code.
 */
export class DaemonRequestError extends Error {
	readonly code: number;
	readonly data: unknown;
	readonly method: string;

	constructor(method: string, code: number, message: string, data?: unknown) {
		super(message);
		this.name = 'DaemonRequestError';
		this.method = method;
		this.code = code;
		this.data = data;
	}
}

// ============================================================================
// Constants
// ============================================================================

/** Default request timeout */
export const REQUEST_TIMEOUT_MS = 30_000;

// ============================================================================
// Connection Class
// ============================================================================

/**
 * Socket connection with JSON-RPC message handling.
 *
 * Events:
 * - 'connect': Socket connected
 * - 'disconnect': Socket disconnected (reason: string)
 * - 'notification': Push notification received (method, params)
 * - 'error': Error after connecting
 */
export class DaemonConnection extends EventEmitter {
	private readonly socketPath: string;
	private socket: net.Socket | null = null;
	private buffer: MessageBuffer;
	private requestId = 0;
	private pendingRequests: Map<number | string, PendingRequest> = new Map();
	private connected = false;

	constructor(socketPath: string) {
		super();
		this.socketPath = socketPath;
		this.buffer = new MessageBuffer();
	}

	isConnected(): boolean {
		return this.connected && this.socket !== null && !this.socket.destroyed;
	}

	/**
	 * Connect to the daemon socket.
	 */
	async connect(timeout: number = 5000): Promise<void> {
		if (this.isConnected()) {
			return;
		}

		return new Promise((resolve, reject) => {
			const socket = net.createConnection(this.socketPath);
			this.socket = socket;

			const timer = setTimeout(() => {
				socket.destroy();
				reject(new Error(`Connection timeout after ${timeout}ms`));
			}, timeout);

			socket.on('connect', () => {
				clearTimeout(timer);
				this.connected = true;
				this.buffer.clear();
				this.emit('connect');
				resolve();
			});

			socket.on('data', data => {
				this.handleData(data);
			});

			socket.on('close', () => {
				const wasConnected = this.connected;
				this.connected = false;
				this.rejectPendingRequests(new Error('Connection closed'));

				if (wasConnected) {
					this.emit('disconnect', 'socket closed');
				}
			});

			socket.on('error', error => {
				clearTimeout(timer);
				if (this.connected) {
					this.connected = false;
					if (this.listenerCount('error') > 0) {
						this.emit('error', error);
					}
				} else {
					reject(error);
				}
			});
		});
	}

	disconnect(): void {
		if (this.socket) {
			this.socket.destroy();
			this.socket = null;
		}
		this.connected = false;
		this.rejectPendingRequests(new Error('Disconnected'));
		this.buffer.clear();
	}

	/**
	 * Send a request and wait for its response.
	 */
	async request(
		method: string,
		params?: Record<string, unknown>,
		timeout: number = REQUEST_TIMEOUT_MS,
	): Promise<unknown> {
		const socket = this.socket;
		if (!socket || !this.isConnected()) {
			throw new Error('Not connected');
		}

		const id = ++this.requestId;
		const request = {
			jsonrpc: '2.0' as const,
			method,
			params,
			id,
		};

		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				this.pendingRequests.delete(id);
				reject(new Error(`Request timeout: ${method}`));
			}, timeout);

			this.pendingRequests.set(id, {method, resolve, reject, timer});

			socket.write(JSON.stringify(request) + '\n', err => {
				if (err) {
					clearTimeout(timer);
					this.pendingRequests.delete(id);
					reject(err);
				}
			});
		});
	}

	private handleData(data: Buffer): void {
		for (const message of this.buffer.append(data.toString())) {
			let raw: unknown;
			try {
				raw = JSON.parse(message);
			} catch {
				this.reportError(new Error(`Failed to parse message: ${message}`));
				continue;
			}
			const parsed = jsonRpcMessageSchema.safeParse(raw);
			if (parsed.success) {
				this.handleMessage(parsed.data);
			} else {
				this.reportError(new Error(`Invalid JSON-RPC message: ${message}`));
			}
		}
	}

	private handleMessage(msg: JsonRpcMessage): void {
		if (msg.id !== undefined && msg.id !== null) {
			const pending = this.pendingRequests.get(msg.id);
			if (!pending) return;
			this.pendingRequests.delete(msg.id);
			clearTimeout(pending.timer);

			if (msg.error) {
				pending.reject(
					new DaemonRequestError(
						pending.method,
						msg.error.code,
						msg.error.message || `Error ${msg.error.code}`,
						msg.error.data,
					),
				);
			} else {
				pending.resolve(msg.result);
			}
		} else if (msg.method) {
			this.emit('notification', msg.method, msg.params ?? {});
		}
	}

	private reportError(error: Error): void {
		if (this.listenerCount('error') > 0) {
			this.emit('error', error);
		}
	}

	private rejectPendingRequests(error: Error): void {
		for (const pending of this.pendingRequests.values()) {
			clearTimeout(pending.timer);
			pending.reject(error);
		}
		this.pendingRequests.clear();
	}
}
