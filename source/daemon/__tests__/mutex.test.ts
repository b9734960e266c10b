import {describe, it, expect} from 'vitest';
import {TimeoutError} from '../lib/errors.js';
import {Mutex, withTimeout} from '../lib/mutex.js';
import {StateContainer, type DaemonState} from '../state.js';
import {deferred} from './helpers.js';

describe('Mutex', () => {
	it('runs critical sections one at a time in arrival order', async () => {
		const mutex = new Mutex();
		const gate = deferred();
		const order: string[] = [];

		const first = mutex.runExclusive(async () => {
			order.push('first:start');
			await gate.promise;
			order.push('first:end');
		});
		const second = mutex.runExclusive(async () => {
			order.push('second');
		});
		const third = mutex.runExclusive(async () => {
			order.push('third');
		});

		await new Promise(resolve => setTimeout(resolve, 0));
		expect(mutex.locked).toBe(true);
		expect(order).toEqual(['first:start']);

		gate.resolve();
		await Promise.all([first, second, third]);
		expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
		expect(mutex.locked).toBe(false);
	});

	it('releases the lock when a section throws', async () => {
		const mutex = new Mutex();
		await expect(
			mutex.runExclusive(async () => {
				throw new Error('failed');
			}),
		).rejects.toThrow('failed');
		expect(await mutex.runExclusive(async () => 'next')).toBe('next');
	});
});

describe('withTimeout', () => {
	it('returns the value when it arrives in time', async () => {
		expect(await withTimeout(Promise.resolve(7), 1000, 'search')).toBe(7);
	});

	it('rejects with TimeoutError when the budget runs out', async () => {
		const never = new Promise<number>(() => {});
		const attempt = withTimeout(never, 10, 'search');
		await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
		await expect(attempt).rejects.toThrow('search timed out after 10ms');
	});
});

describe('StateContainer', () => {
	it('merges nested updates and notifies subscribers', () => {
		const state = new StateContainer();
		const seen: DaemonState[] = [];
		const unsubscribe = state.subscribe(snapshot => seen.push(snapshot));

		state.updateNested('indexing', () => ({status: 'indexing', phase: 'embed', total: 4}));
		expect(state.getSnapshot().indexing).toMatchObject({
			status: 'indexing',
			phase: 'embed',
			current: 0,
			total: 4,
		});

		unsubscribe();
		state.updateNested('indexing', current => ({current: current.total}));
		expect(state.getSnapshot().indexing.current).toBe(4);
		expect(seen).toHaveLength(1);

		state.reset();
		expect(state.getSnapshot().indexing.status).toBe('idle');
	});
});
