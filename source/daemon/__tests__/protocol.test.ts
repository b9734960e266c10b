import {describe, it, expect} from 'vitest';
import {
	BuildInProgressError,
	DependencyMissingError,
	EmbeddingMismatchError,
	IndexNotFoundError,
	InvalidArgumentError,
	TimeoutError,
} from '../lib/errors.js';
import {
	ErrorCodes,
	JsonRpcMethodError,
	JsonRpcParseError,
	MessageBuffer,
	formatError,
	formatNotification,
	formatResponse,
	parseRequest,
	toJsonRpcError,
} from '../protocol.js';

describe('parseRequest', () => {
	it('accepts a well-formed request', () => {
		expect(
			parseRequest('{"jsonrpc":"2.0","method":"search","params":{"query":"x"},"id":1}'),
		).toEqual({jsonrpc: '2.0', method: 'search', params: {query: 'x'}, id: 1});
	});

	it('rejects invalid JSON', () => {
		expect(() => parseRequest('{nope')).toThrow(JsonRpcParseError);
		expect(() => parseRequest('{nope')).toThrow('Invalid JSON');
	});

	it.each([
		['wrong version', '{"jsonrpc":"1.0","method":"ping","id":1}'],
		['missing id', '{"jsonrpc":"2.0","method":"ping"}'],
		['array params', '{"jsonrpc":"2.0","method":"ping","params":[1],"id":1}'],
		['non-object', '42'],
	])('rejects %s', (_label, line) => {
		expect(() => parseRequest(line)).toThrow('Invalid JSON-RPC 2.0 request');
	});
});

describe('formatting', () => {
	it('terminates every message with a newline', () => {
		expect(formatResponse(1, {ok: true})).toBe('{"jsonrpc":"2.0","result":{"ok":true},"id":1}\n');
		expect(formatNotification('indexProgress', {current: 1})).toBe(
			'{"jsonrpc":"2.0","method":"indexProgress","params":{"current":1}}\n',
		);
	});

	it('includes error data only when given', () => {
		expect(formatError(2, ErrorCodes.INVALID_PARAMS, 'bad')).toBe(
			'{"jsonrpc":"2.0","error":{"code":-32602,"message":"bad"},"id":2}\n',
		);
		expect(formatError(null, ErrorCodes.INTERNAL_ERROR, 'boom', {retry: false})).toBe(
			'{"jsonrpc":"2.0","error":{"code":-32603,"message":"boom","data":{"retry":false}},"id":null}\n',
		);
	});
});

describe('toJsonRpcError', () => {
	it('maps search errors to application codes', () => {
		expect(toJsonRpcError(new InvalidArgumentError('bad query')).code).toBe(
			ErrorCodes.INVALID_PARAMS,
		);
		expect(toJsonRpcError(new BuildInProgressError('/idx'))).toMatchObject({
			code: ErrorCodes.BUILD_IN_PROGRESS,
			data: {retryable: true},
		});
		expect(toJsonRpcError(new IndexNotFoundError()).code).toBe(ErrorCodes.INDEX_NOT_FOUND);
		expect(toJsonRpcError(new TimeoutError('search', 5)).code).toBe(
			ErrorCodes.REQUEST_TIMEOUT,
		);
	});

	it('carries the install command for missing dependencies', () => {
		expect(toJsonRpcError(new DependencyMissingError('X', ['fastembed']))).toMatchObject({
			code: ErrorCodes.DEPENDENCY_MISSING,
			data: {installCommand: 'npm install fastembed'},
		});
	});

	it('passes method errors through and treats the rest as internal', () => {
		expect(
			toJsonRpcError(new JsonRpcMethodError(ErrorCodes.NOT_INITIALIZED, 'later', {a: 1})),
		).toEqual({code: ErrorCodes.NOT_INITIALIZED, message: 'later', data: {a: 1}});
		expect(toJsonRpcError(new EmbeddingMismatchError(2, 1)).code).toBe(
			ErrorCodes.INTERNAL_ERROR,
		);
		expect(toJsonRpcError('plain string')).toEqual({
			code: ErrorCodes.INTERNAL_ERROR,
			message: 'plain string',
		});
	});
});

describe('MessageBuffer', () => {
	it('yields complete lines and keeps the remainder', () => {
		const buffer = new MessageBuffer();
		expect(buffer.append('{"a":1}\n{"b"')).toEqual(['{"a":1}']);
		expect(buffer.append(':2}\n\n')).toEqual(['{"b":2}']);
		expect(buffer.append('{"c":3}')).toEqual([]);
		buffer.clear();
		expect(buffer.append('\n')).toEqual([]);
	});
});
