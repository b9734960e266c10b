/**
 * Daemon Method Handlers
 *
 * JSON-RPC method implementations for daemon IPC.
 * Each handler receives params and a context with access to owner and server.
 */

import {z} from 'zod';
import {DEFAULT_CONFIG} from './lib/config.js';
import {InvalidArgumentError} from './lib/errors.js';
import {withTimeout} from './lib/mutex.js';
import {PROTOCOL_VERSION} from './protocol.js';
import type {Handler, HandlerContext, HandlerRegistry} from './server.js';

// ============================================================================
// Parameter Schemas
// ============================================================================

const searchParamsSchema = z.object({
	query: z.string().min(1),
	limit: z.number().int().min(1).max(100).optional(),
});

const indexParamsSchema = z.object({
	rebuild: z.boolean().optional(),
	backend: z.enum(['auto', 'single-vector', 'multi-vector']).optional(),
	language: z.string().min(1).optional(),
});

const shutdownParamsSchema = z.object({
	reason: z.string().optional(),
});

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
	const result = schema.safeParse(params ?? {});
	if (!result.success) {
		throw new InvalidArgumentError(
			`Invalid params: ${result.error.issues
				.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
				.join('; ')}`,
		);
	}
	return result.data;
}

function timed<T>(ctx: HandlerContext, operation: string, work: Promise<T>): Promise<T> {
	const budget = ctx.owner.getConfig()?.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs;
	return withTimeout(work, budget, operation);
}

// ============================================================================
// Handlers
// ============================================================================

const searchHandler: Handler = async (params, ctx) => {
	const {query, limit} = parseParams(searchParamsSchema, params);
	return timed(ctx, 'search', ctx.owner.search(query, limit));
};

/**
 * Index handler. Streams `indexProgress` notifications to the requesting
 * client while the build runs.
 */
const indexHandler: Handler = async (params, ctx) => {
	const validated = parseParams(indexParamsSchema, params);

	const unsubscribe = ctx.owner.state.subscribe(({indexing}) => {
		ctx.server.notify(ctx.clientId, 'indexProgress', {
			status: indexing.status,
			phase: indexing.phase,
			current: indexing.current,
			total: indexing.total,
			stage: indexing.stage,
		});
	});

	try {
		return await timed(ctx, 'index', ctx.owner.index(validated));
	} finally {
		unsubscribe();
	}
};

const statusHandler: Handler = async (_params, ctx) => {
	return timed(ctx, 'status', ctx.owner.getStatus());
};

/**
 * Shutdown handler. Replies first, then stops the server on the next tick.
 */
const shutdownHandler: Handler = async (params, ctx) => {
	const validated = parseParams(shutdownParamsSchema, params);
	ctx.owner
		.getLogger()
		?.info('Daemon', `Shutdown requested: ${validated.reason ?? 'no reason'}`);

	setImmediate(() => {
		void ctx.server.requestShutdown();
	});

	return {success: true};
};

const pingHandler: Handler = async () => {
	return {
		pong: true,
		timestamp: Date.now(),
		protocolVersion: PROTOCOL_VERSION,
	};
};

// ============================================================================
// Handler Registry
// ============================================================================

export function createHandlers(): HandlerRegistry {
	return {
		ping: pingHandler,
		search: searchHandler,
		index: indexHandler,
		status: statusHandler,
		shutdown: shutdownHandler,
	};
}
