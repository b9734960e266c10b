/**
 * Promise-chained mutex and timeout helpers.
 */

import {TimeoutError} from './errors.js';

/**
 * Serialises async critical sections in FIFO order.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private held = false;

	get locked(): boolean {
		return this.held;
	}

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const previous = this.tail;
		let release: () => void = () => {};
		this.tail = new Promise<void>(resolve => {
			release = resolve;
		});

		await previous;
		this.held = true;
		try {
			return await fn();
		} finally {
			this.held = false;
			release();
		}
	}
}

/**
 * Race a promise against a wall-clock budget.
 * The underlying work is not cancelled; the caller just stops waiting.
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	operation: string,
): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		if (timer) clearTimeout(timer);
	}
}
