/**
 * Tests for the HTTP provider helpers: retry, batching, response errors.
 */

import {describe, it, expect, afterEach, vi} from 'vitest';
import {
	MAX_ATTEMPTS,
	NonRetriableApiError,
	assertOk,
	chunk,
	processBatchesWithLimit,
	withRetry,
} from '../providers/api-utils.js';

describe('withRetry', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('stops after max attempts and returns the last error', async () => {
		vi.useFakeTimers();
		let attempts = 0;

		const promise = withRetry(async () => {
			attempts += 1;
			throw new Error(`boom ${attempts}`);
		});

		const expectation = expect(promise).rejects.toThrow(`boom ${MAX_ATTEMPTS}`);
		await vi.runAllTimersAsync();
		await expectation;
		expect(attempts).toBe(MAX_ATTEMPTS);
	});

	it('returns the first success after a transient failure', async () => {
		let attempts = 0;
		const result = await withRetry(
			async () => {
				attempts += 1;
				if (attempts === 1) throw new Error('429 Too Many Requests');
				return 'ok';
			},
			{initialBackoffMs: 1},
		);
		expect(result).toBe('ok');
		expect(attempts).toBe(2);
	});

	it('does not retry client errors', async () => {
		let attempts = 0;
		const promise = withRetry(async () => {
			attempts += 1;
			throw new NonRetriableApiError('OpenAI API error (401): bad key', 401);
		});

		await expect(promise).rejects.toThrow('bad key');
		expect(attempts).toBe(1);
	});
});

describe('batching', () => {
	it('splits arrays into fixed-size batches', () => {
		expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
		expect(chunk([], 3)).toEqual([]);
	});

	it('keeps input order whatever order batches finish in', async () => {
		const results = await processBatchesWithLimit(
			[
				['a', 'b'],
				['c'],
				['d', 'e'],
			],
			async (batch, index) => {
				await new Promise(resolve => setTimeout(resolve, (3 - index) * 5));
				return batch.map(item => item.toUpperCase());
			},
			2,
		);
		expect(results).toEqual(['A', 'B', 'C', 'D', 'E']);
	});
});

describe('assertOk', () => {
	it('passes successful responses', async () => {
		await expect(assertOk(new Response('{}', {status: 200}), 'Ollama')).resolves.toBeUndefined();
	});

	it('marks client errors as non-retriable with the API message', async () => {
		const response = new Response(JSON.stringify({error: {message: 'model not found'}}), {
			status: 404,
		});
		const attempt = assertOk(response, 'OpenAI');
		await expect(attempt).rejects.toBeInstanceOf(NonRetriableApiError);
		await expect(attempt).rejects.toThrow('OpenAI API error (404): model not found');
	});

	it('leaves rate limits and server errors retriable', async () => {
		const limited = assertOk(new Response('slow down', {status: 429}), 'Ollama');
		await expect(limited).rejects.not.toBeInstanceOf(NonRetriableApiError);
		await expect(limited).rejects.toThrow('Ollama API error (429): slow down');

		const failed = assertOk(new Response(JSON.stringify({error: 'overloaded'}), {status: 503}), 'Ollama');
		await expect(failed).rejects.toThrow('Ollama API error (503): overloaded');
	});
});
