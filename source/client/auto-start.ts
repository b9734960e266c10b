/**
 * Daemon Auto-Start Logic
 *
 * Spawns the daemon if it is not running and waits for its socket.
 * The daemon's proper-lockfile lock is the single-instance guard.
 */

import {spawn} from 'node:child_process';
import * as net from 'node:net';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import {fileURLToPath} from 'node:url';
import lockfile from 'proper-lockfile';
import {
	getDaemonLockPath,
	getDaemonPidPath,
	getDaemonSocketPath,
	getRunDir,
} from '../daemon/lib/constants.js';

// ============================================================================
// Constants
// ============================================================================

/** Maximum time to wait for the daemon to start */
const DAEMON_START_TIMEOUT_MS = 30_000;

const SOCKET_POLL_INTERVAL_MS = 100;

const CONNECT_TIMEOUT_MS = 5000;

// ============================================================================
// Checks
// ============================================================================

/**
 * Whether the daemon lock is held (daemon running or starting).
 */
export async function isDaemonLocked(projectRoot: string): Promise<boolean> {
	try {
		return await lockfile.check(getRunDir(projectRoot), {
			lockfilePath: getDaemonLockPath(projectRoot),
			stale: 30_000,
		});
	} catch {
		// No run dir or lock file yet
		return false;
	}
}

export async function isSocketConnectable(
	socketPath: string,
	timeout: number = CONNECT_TIMEOUT_MS,
): Promise<boolean> {
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

// ============================================================================
// Stale File Cleanup
// ============================================================================

function isProcessRunning(pid: number): boolean {
	try {
		// Signal 0 only checks that the process exists
		process.kill(pid, 0);
		return true;
	} catch {
		return false;
	}
}

/**
 * Remove socket and pid files left by a daemon that is no longer running.
 */
async function cleanupStaleFiles(socketPath: string, pidPath: string): Promise<void> {
	let pid = Number.NaN;
	try {
		pid = parseInt((await fs.readFile(pidPath, 'utf-8')).trim(), 10);
	} catch {
		// No pid file: whatever socket exists is orphaned
	}

	if (!Number.isNaN(pid) && isProcessRunning(pid)) {
		return;
	}
	await fs.rm(socketPath, {force: true});
	await fs.rm(pidPath, {force: true});
}

// ============================================================================
// Daemon Spawning
// ============================================================================

/**
 * The daemon entry point, next to this module's compiled output.
 */
function findDaemonScript(): string {
	const modulePath = fileURLToPath(import.meta.url);
	return path.resolve(path.dirname(modulePath), '../daemon/index.js');
}

async function spawnDaemon(projectRoot: string): Promise<void> {
	const daemonScript = findDaemonScript();
	await fs.access(daemonScript);

	const daemon = spawn(process.execPath, [daemonScript], {
		cwd: projectRoot,
		detached: true,
		stdio: 'ignore',
		windowsHide: true,
		env: {...process.env, CODELOUPE_PROJECT_ROOT: projectRoot},
	});
	daemon.unref();
}

async function waitForSocket(
	socketPath: string,
	timeout: number = DAEMON_START_TIMEOUT_MS,
): Promise<void> {
	const startTime = Date.now();

	while (Date.now() - startTime < timeout) {
		if (await isSocketConnectable(socketPath, 500)) {
			return;
		}
		await new Promise(r => setTimeout(r, SOCKET_POLL_INTERVAL_MS));
	}

	throw new Error(`Daemon failed to start within ${timeout}ms`);
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Ensure the daemon is running for a project, starting it if needed.
 *
 * 1. Socket connectable: already running
 * 2. Lock held: starting up, wait for the socket
 * 3. Otherwise clean stale files and spawn
 */
export async function ensureDaemonRunning(projectRoot: string): Promise<void> {
	const socketPath = getDaemonSocketPath(projectRoot);

	if (await isSocketConnectable(socketPath)) {
		return;
	}

	if (await isDaemonLocked(projectRoot)) {
		await waitForSocket(socketPath);
		return;
	}

	await cleanupStaleFiles(socketPath, getDaemonPidPath(projectRoot));
	await spawnDaemon(projectRoot);
	await waitForSocket(socketPath);
}

/**
 * Whether a daemon is serving (socket connectable) right now.
 */
export async function isDaemonRunning(projectRoot: string): Promise<boolean> {
	return isSocketConnectable(getDaemonSocketPath(projectRoot), 1000);
}
