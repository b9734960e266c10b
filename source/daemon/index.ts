#!/usr/bin/env node
/**
 * codeloupe daemon entry point.
 *
 * One daemon per project keeps the backend (and its encoder) resident; the
 * CLI connects as a client over a Unix socket.
 *
 * The project root is the current working directory, or
 * $CODELOUPE_PROJECT_ROOT when started by a client. Socket, pid and lock
 * files live under the codeloupe home run directory, never in the project.
 */

import fs from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import {createHandlers} from './handlers.js';
import {
	getCanonicalProjectRoot,
	getDaemonLockPath,
	getDaemonPidPath,
	getDaemonSocketPath,
	getRunDir,
} from './lib/constants.js';
import {combineLoggers, createConsoleLogger, createServiceLogger} from './lib/logger.js';
import {LifecycleManager} from './lifecycle.js';
import {DaemonOwner} from './owner.js';
import {DaemonServer} from './server.js';

export const PROJECT_ROOT_ENV = 'CODELOUPE_PROJECT_ROOT';

const projectRoot = getCanonicalProjectRoot(process.env[PROJECT_ROOT_ENV] ?? process.cwd());
const logger = combineLoggers(
	createServiceLogger(projectRoot, 'daemon'),
	createConsoleLogger('info'),
);

/**
 * Acquire the exclusive per-project daemon lock. Exits when another daemon
 * already holds it.
 */
async function acquireDaemonLock(): Promise<() => Promise<void>> {
	const runDir = getRunDir(projectRoot);
	await fs.mkdir(runDir, {recursive: true});

	try {
		const release = await lockfile.lock(runDir, {
			lockfilePath: getDaemonLockPath(projectRoot),
			stale: 30_000,
			update: 10_000,
			retries: 0,
			onCompromised: err => {
				logger.error('Daemon', 'Lock compromised; another daemon may have started', err);
				process.exit(1);
			},
		});
		logger.info('Daemon', 'Acquired exclusive lock');
		return release;
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ELOCKED') {
			logger.info('Daemon', 'Another daemon is already running for this project');
			process.exit(1);
		}
		throw error;
	}
}

async function main(): Promise<void> {
	logger.info('Daemon', `Starting for ${projectRoot}`);

	const release = await acquireDaemonLock();

	const owner = new DaemonOwner(projectRoot, {logger});
	await owner.initialize();

	const server = new DaemonServer(owner, {
		socketPath: getDaemonSocketPath(projectRoot),
		pidPath: getDaemonPidPath(projectRoot),
		logger,
	});
	server.setHandlers(createHandlers());

	const lifecycle = new LifecycleManager(server, owner, {
		logger,
		onShutdown: () => release(),
	});

	await server.start();
	lifecycle.registerSignalHandlers();
	lifecycle.startInitialIdleTimer();

	logger.info('Daemon', `Ready (pid ${process.pid})`);
}

main().catch(error => {
	logger.error('Daemon', 'Fatal error', error instanceof Error ? error : new Error(String(error)));
	process.exit(1);
});
