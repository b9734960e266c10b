/**
 * Shared utilities for HTTP embedding providers.
 *
 * Provides retry with exponential backoff and p-limit batch concurrency.
 */

import pLimit from 'p-limit';
import type {Logger} from '../lib/logger.js';
import {CONCURRENCY} from '../lib/constants.js';

// ============================================================================
// Constants
// ============================================================================

/** Maximum attempts per batch (initial attempt + retries) */
export const MAX_ATTEMPTS = 5;

/** Initial backoff (ms) */
export const INITIAL_BACKOFF_MS = 1000;

/** Maximum backoff (ms) */
export const MAX_BACKOFF_MS = 30000;

// ============================================================================
// Utility Functions
// ============================================================================

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Check if an error is a rate limit error (429 or quota exceeded).
 */
export function isRateLimitError(error: unknown): boolean {
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		return msg.includes('429') || msg.includes('rate') || msg.includes('quota');
	}
	return false;
}

/**
 * HTTP errors that retrying cannot fix (bad key, bad request, unknown model).
 */
export class NonRetriableApiError extends Error {
	readonly status: number;

	constructor(message: string, status: number) {
		super(message);
		this.name = 'NonRetriableApiError';
		this.status = status;
	}
}

export interface RetryOptions {
	maxAttempts?: number;
	initialBackoffMs?: number;
	logger?: Logger;
	/** Label used in log lines */
	label?: string;
}

/**
 * Execute an async function with exponential backoff retry.
 * NonRetriableApiError is rethrown immediately.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
	let backoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
	let attempt = 0;

	while (true) {
		attempt++;
		try {
			return await fn();
		} catch (error) {
			if (error instanceof NonRetriableApiError || attempt >= maxAttempts) {
				throw error;
			}

			const reason = isRateLimitError(error) ? 'Rate limited' : 'Error';
			options.logger?.warn('api-utils', `${reason}, retrying`, {
				label: options.label,
				attempt: attempt + 1,
				maxAttempts,
				backoffMs,
				error: error instanceof Error ? error.message : String(error),
			});

			await sleep(backoffMs);
			backoffMs = Math.min(backoffMs * 2, MAX_BACKOFF_MS);
		}
	}
}

/**
 * Process batches with p-limit sliding window concurrency.
 * Results keep input order; any batch failure rejects the whole call.
 */
export async function processBatchesWithLimit<T, R>(
	batches: T[][],
	processBatch: (batch: T[], batchIndex: number) => Promise<R[]>,
	concurrency: number = CONCURRENCY,
): Promise<R[]> {
	const limit = pLimit(concurrency);
	const results = await Promise.all(
		batches.map((batch, batchIndex) =>
			limit(() => processBatch(batch, batchIndex)),
		),
	);
	return results.flat();
}

/**
 * Split an array into batches of a specified size.
 */
export function chunk<T>(array: T[], size: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		batches.push(array.slice(i, i + size));
	}
	return batches;
}

/**
 * Extract a readable error message from a failed HTTP response body.
 */
export async function readErrorMessage(response: Response): Promise<string> {
	const errorText = await response.text();
	try {
		const parsed: unknown = JSON.parse(errorText);
		if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
			const inner = parsed.error;
			if (typeof inner === 'string') return inner;
			if (
				typeof inner === 'object' &&
				inner !== null &&
				'message' in inner &&
				typeof inner.message === 'string'
			) {
				return inner.message;
			}
		}
	} catch {
		// Not JSON; fall through to the raw body
	}
	return errorText;
}

/**
 * Throw for a non-OK response. Client errors other than 429 are not retried.
 */
export async function assertOk(response: Response, provider: string): Promise<void> {
	if (response.ok) return;
	const message = await readErrorMessage(response);
	const text = `${provider} API error (${response.status}): ${message}`;
	if (response.status >= 400 && response.status < 500 && response.status !== 429) {
		throw new NonRetriableApiError(text, response.status);
	}
	throw new Error(text);
}
