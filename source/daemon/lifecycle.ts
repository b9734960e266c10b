/**
 * Daemon Lifecycle Manager
 *
 * Handles:
 * - Activity-based idle timeout (any request resets the timer)
 * - Signal handling (SIGINT, SIGTERM)
 * - Graceful shutdown coordination
 */

import type {Logger} from './lib/logger.js';
import type {DaemonOwner} from './owner.js';
import type {DaemonServer} from './server.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Default idle timeout: 5 minutes.
 */
export const DEFAULT_IDLE_TIMEOUT_MS = 5 * 60 * 1000;

export interface LifecycleOptions {
	idleTimeoutMs?: number;
	logger?: Logger;
	/** Runs before owner and server are closed (e.g. release the daemon lock) */
	onShutdown?: (reason: string) => Promise<void>;
	/** Called last; the entry point exits the process here */
	exit?: (code: number) => void;
}

// ============================================================================
// Lifecycle Manager
// ============================================================================

export class LifecycleManager {
	private readonly server: DaemonServer;
	private readonly owner: DaemonOwner;
	private readonly idleTimeoutMs: number;
	private readonly logger: Logger | undefined;
	private readonly onShutdown: ((reason: string) => Promise<void>) | null;
	private readonly exit: (code: number) => void;

	private idleTimer: ReturnType<typeof setTimeout> | null = null;
	private shuttingDown = false;
	private lastActivityTime: number = Date.now();

	constructor(server: DaemonServer, owner: DaemonOwner, options: LifecycleOptions = {}) {
		this.server = server;
		this.owner = owner;
		this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
		this.logger = options.logger;
		this.onShutdown = options.onShutdown ?? null;
		this.exit = options.exit ?? (code => process.exit(code));

		this.server.onActivity = this.onActivity.bind(this);
		this.server.onShutdownRequested = () => this.shutdown('client request');
	}

	get isShuttingDown(): boolean {
		return this.shuttingDown;
	}

	/**
	 * Called on each request to reset the idle timer.
	 */
	onActivity(): void {
		this.lastActivityTime = Date.now();
		this.resetIdleTimer();
	}

	private resetIdleTimer(): void {
		if (this.shuttingDown) return;

		if (this.idleTimer) {
			clearTimeout(this.idleTimer);
		}

		this.idleTimer = setTimeout(() => {
			const idleSeconds = Math.round((Date.now() - this.lastActivityTime) / 1000);
			this.logger?.info(
				'Lifecycle',
				`Idle for ${idleSeconds}s, exceeds ${this.idleTimeoutMs / 1000}s limit`,
			);
			void this.shutdown('idle timeout');
		}, this.idleTimeoutMs);
	}

	private cancelIdleTimer(): void {
		if (this.idleTimer) {
			clearTimeout(this.idleTimer);
			this.idleTimer = null;
		}
	}

	registerSignalHandlers(): void {
		const handler = (signal: string) => {
			this.logger?.info('Lifecycle', `Received ${signal}`);
			void this.shutdown(signal);
		};

		process.on('SIGINT', () => handler('SIGINT'));
		process.on('SIGTERM', () => handler('SIGTERM'));
	}

	/**
	 * Close owner and server, then exit. Never rejects.
	 */
	async shutdown(reason: string): Promise<void> {
		if (this.shuttingDown) {
			return;
		}
		this.shuttingDown = true;
		this.logger?.info('Lifecycle', `Shutting down: ${reason}`);
		this.cancelIdleTimer();

		let code = 0;
		try {
			await this.owner.shutdown();
			await this.server.stop();
			if (this.onShutdown) {
				await this.onShutdown(reason);
			}
		} catch (error) {
			code = 1;
			this.logger?.error(
				'Lifecycle',
				'Error during shutdown',
				error instanceof Error ? error : new Error(String(error)),
			);
		}

		this.exit(code);
	}

	/**
	 * Start the idle timer before any request has arrived.
	 */
	startInitialIdleTimer(): void {
		this.logger?.debug('Lifecycle', `Starting idle timer (${this.idleTimeoutMs / 1000}s timeout)`);
		this.resetIdleTimer();
	}
}
