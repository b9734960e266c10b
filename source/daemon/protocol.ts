/**
 * JSON-RPC 2.0 protocol types and helpers for daemon IPC.
 *
 * Protocol: Newline-delimited JSON over Unix socket.
 * Each message is a complete JSON object followed by '\n'.
 */

import {DependencyMissingError, isSearchError} from './lib/errors.js';

// ============================================================================
// JSON-RPC 2.0 Types
// ============================================================================

/**
 * JSON-RPC 2.0 request from client to daemon.
 */
export interface JsonRpcRequest {
	jsonrpc: '2.0';
	method: string;
	params?: Record<string, unknown>;
	id: number | string;
}

/**
 * JSON-RPC 2.0 response from daemon to client.
 */
export interface JsonRpcResponse {
	jsonrpc: '2.0';
	result?: unknown;
	error?: JsonRpcError;
	id: number | string | null;
}

/**
 * JSON-RPC 2.0 notification from daemon to client (indexing progress).
 */
export interface JsonRpcNotification {
	jsonrpc: '2.0';
	method: string;
	params: Record<string, unknown>;
}

/**
 * JSON-RPC 2.0 error object.
 */
export interface JsonRpcError {
	code: number;
	message: string;
	data?: unknown;
}

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Standard JSON-RPC 2.0 error codes and custom application codes.
 */
export const ErrorCodes = {
	// Standard JSON-RPC 2.0 errors
	PARSE_ERROR: -32700,
	INVALID_REQUEST: -32600,
	METHOD_NOT_FOUND: -32601,
	INVALID_PARAMS: -32602,
	INTERNAL_ERROR: -32603,

	// Custom application errors (-32000 to -32099 reserved for implementation)
	NOT_INITIALIZED: -32001,
	BUILD_IN_PROGRESS: -32002,
	SHUTDOWN_IN_PROGRESS: -32003,
	CONNECTION_ERROR: -32004,
	DEPENDENCY_MISSING: -32005,
	INDEX_NOT_FOUND: -32006,
	REQUEST_TIMEOUT: -32007,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Method Types
// ============================================================================

/**
 * Available daemon methods.
 */
export type DaemonMethod = 'ping' | 'search' | 'index' | 'status' | 'shutdown';

// ============================================================================
// Protocol Version
// ============================================================================

/**
 * Protocol version for client/daemon compatibility checking.
 * Increment when making breaking changes to the protocol.
 */
export const PROTOCOL_VERSION = 1;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse a JSON-RPC request from a string.
 * Returns the parsed request or throws an error.
 */
export function parseRequest(line: string): JsonRpcRequest {
	let parsed: unknown;
	try {
		parsed = JSON.parse(line);
	} catch {
		throw new JsonRpcParseError('Invalid JSON');
	}

	if (!isValidRequest(parsed)) {
		throw new JsonRpcParseError('Invalid JSON-RPC 2.0 request');
	}

	return parsed;
}

/**
 * Type guard for valid JSON-RPC 2.0 request.
 */
function isValidRequest(obj: unknown): obj is JsonRpcRequest {
	if (typeof obj !== 'object' || obj === null) return false;
	const params: unknown = Reflect.get(obj, 'params');
	const id: unknown = Reflect.get(obj, 'id');
	return (
		Reflect.get(obj, 'jsonrpc') === '2.0' &&
		typeof Reflect.get(obj, 'method') === 'string' &&
		(typeof id === 'number' || typeof id === 'string') &&
		(params === undefined ||
			(typeof params === 'object' && params !== null && !Array.isArray(params)))
	);
}

/**
 * Format a successful JSON-RPC response.
 */
export function formatResponse(
	id: number | string | null,
	result: unknown,
): string {
	const response: JsonRpcResponse = {
		jsonrpc: '2.0',
		result,
		id,
	};
	return JSON.stringify(response) + '\n';
}

/**
 * Format a server-to-client notification (no id, no reply expected).
 */
export function formatNotification(
	method: string,
	params: Record<string, unknown>,
): string {
	const notification: JsonRpcNotification = {jsonrpc: '2.0', method, params};
	return JSON.stringify(notification) + '\n';
}

/**
 * Format a JSON-RPC error response.
 */
export function formatError(
	id: number | string | null,
	code: ErrorCode,
	message: string,
	data?: unknown,
): string {
	const response: JsonRpcResponse = {
		jsonrpc: '2.0',
		error: {code, message, ...(data !== undefined && {data})},
		id,
	};
	return JSON.stringify(response) + '\n';
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when parsing JSON-RPC message fails.
 */
export class JsonRpcParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'JsonRpcParseError';
	}
}

/**
 * Error class for JSON-RPC method errors.
 * Use this in handlers to return structured errors.
 */
export class JsonRpcMethodError extends Error {
	readonly code: ErrorCode;
	readonly data?: unknown;

	constructor(code: ErrorCode, message: string, data?: unknown) {
		super(message);
		this.name = 'JsonRpcMethodError';
		this.code = code;
		this.data = data;
	}
}

/**
 * Map any thrown value to a JSON-RPC error code and message.
 */
export function toJsonRpcError(error: unknown): {code: ErrorCode; message: string; data?: unknown} {
	if (error instanceof JsonRpcMethodError) {
		return {code: error.code, message: error.message, data: error.data};
	}
	if (isSearchError(error)) {
		switch (error.code) {
			case 'INVALID_ARGUMENT':
				return {code: ErrorCodes.INVALID_PARAMS, message: error.message};
			case 'BUILD_IN_PROGRESS':
				return {code: ErrorCodes.BUILD_IN_PROGRESS, message: error.message, data: {retryable: true}};
			case 'DEPENDENCY_MISSING':
				return {
					code: ErrorCodes.DEPENDENCY_MISSING,
					message: error.message,
					data: error instanceof DependencyMissingError ? {installCommand: error.installCommand} : undefined,
				};
			case 'INDEX_NOT_FOUND':
				return {code: ErrorCodes.INDEX_NOT_FOUND, message: error.message};
			case 'TIMEOUT':
				return {code: ErrorCodes.REQUEST_TIMEOUT, message: error.message};
			case 'EMBEDDING_MISMATCH':
				break;
		}
	}
	return {
		code: ErrorCodes.INTERNAL_ERROR,
		message: error instanceof Error ? error.message : String(error),
	};
}

// ============================================================================
// Message Parsing Utilities
// ============================================================================

/**
 * Buffer for accumulating partial messages.
 * Messages are newline-delimited, so we need to buffer until we see '\n'.
 */
export class MessageBuffer {
	private buffer = '';

	/**
	 * Add data to buffer and extract complete messages.
	 * Returns array of complete message strings.
	 */
	append(data: string): string[] {
		this.buffer += data;
		const messages: string[] = [];

		let newlineIndex: number;
		while ((newlineIndex = this.buffer.indexOf('\n')) !== -1) {
			const line = this.buffer.slice(0, newlineIndex);
			this.buffer = this.buffer.slice(newlineIndex + 1);

			if (line.trim()) {
				messages.push(line);
			}
		}

		return messages;
	}

	/**
	 * Clear the buffer.
	 */
	clear(): void {
		this.buffer = '';
	}
}
