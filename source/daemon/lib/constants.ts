/**
 * Constants - Paths, index layout names, and configuration constants.
 *
 * All persisted state lives under the codeloupe home directory, never inside
 * the user's project folder.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the codeloupe home directory.
 */
export const CODELOUPE_HOME_ENV = 'CODELOUPE_HOME';

/**
 * Get the codeloupe home directory.
 *
 * Default: ~/.local/share/codeloupe
 * Override: $CODELOUPE_HOME
 * Linux (conventional): $XDG_DATA_HOME/codeloupe
 */
export function getHomeDir(): string {
	const override = process.env[CODELOUPE_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'codeloupe');

	return path.join(os.homedir(), '.local', 'share', 'codeloupe');
}

/**
 * Resolve the canonical project root for stable project identity.
 * Uses realpath to avoid treating symlinked paths as different projects.
 */
export function getCanonicalProjectRoot(projectRoot: string): string {
	return fs.realpathSync(projectRoot);
}

/**
 * Get a stable per-project identifier derived from the canonical project root.
 */
export function getProjectId(projectRoot: string): string {
	const canonical = getCanonicalProjectRoot(projectRoot);
	return crypto
		.createHash('sha256')
		.update(`codeloupe:${canonical}`)
		.digest('hex')
		.slice(0, 20);
}

/**
 * Get the directory that stores all per-project state (config, index, logs).
 */
export function getProjectDataDir(projectRoot: string): string {
	return path.join(getHomeDir(), 'projects', getProjectId(projectRoot));
}

export function getConfigPath(projectRoot: string): string {
	return path.join(getProjectDataDir(projectRoot), 'config.json');
}

// ============================================================================
// Index Layout
// ============================================================================

/**
 * Root of the persisted index. Holds the top-level meta.json, the lexical
 * index, and one subdirectory per backend.
 */
export function getIndexDir(projectRoot: string): string {
	return path.join(getProjectDataDir(projectRoot), 'index');
}

export const INDEX_LAYOUT = {
	META_FILE: 'meta.json',
	SENTINEL_FILE: '.build_in_progress',
	LOCK_FILE: '.build.lock',
	LEXICAL_DIR: 'lexical',
	SINGLE_VECTOR_DIR: 'vector',
	MULTI_VECTOR_DIR: 'plaid',
	/** Active PLAID index inside the multi-vector directory */
	PLAID_ACTIVE_DIR: 'index',
	PLAID_OLD_DIR: 'index-old',
	PLAID_BUILD_PREFIX: 'index-build-',
} as const;

export const INDEX_FORMAT_VERSION = '1.0';

// ============================================================================
// Logging Paths
// ============================================================================

export function getLogsDir(projectRoot: string): string {
	return path.join(getProjectDataDir(projectRoot), 'logs');
}

/**
 * Service names for logging.
 */
export type ServiceName = 'daemon' | 'cli' | 'indexer';

export function getServiceLogsDir(
	projectRoot: string,
	service: ServiceName,
): string {
	return path.join(getLogsDir(projectRoot), service);
}

/**
 * Get the path to a service's current hourly log file.
 * Format: {projectDataDir}/logs/{service}/YYYY-MM-DD-HH.log
 */
export function getServiceLogPath(
	projectRoot: string,
	service: ServiceName,
): string {
	const now = new Date();
	const year = now.getFullYear();
	const month = String(now.getMonth() + 1).padStart(2, '0');
	const day = String(now.getDate()).padStart(2, '0');
	const hour = String(now.getHours()).padStart(2, '0');
	const filename = `${year}-${month}-${day}-${hour}.log`;
	return path.join(getServiceLogsDir(projectRoot, service), filename);
}

// ============================================================================
// Daemon Runtime Paths (socket/pid/lock)
// ============================================================================

export function getRunDir(projectRoot: string): string {
	return path.join(getHomeDir(), 'run', getProjectId(projectRoot));
}

/**
 * Get the daemon socket path (Unix) or named pipe (Windows).
 */
export function getDaemonSocketPath(projectRoot: string): string {
	if (process.platform === 'win32') {
		return `\\\\.\\pipe\\codeloupe-${getProjectId(projectRoot)}`;
	}
	return path.join(getRunDir(projectRoot), 'daemon.sock');
}

export function getDaemonPidPath(projectRoot: string): string {
	return path.join(getRunDir(projectRoot), 'daemon.pid');
}

export function getDaemonLockPath(projectRoot: string): string {
	return path.join(getRunDir(projectRoot), 'daemon.lock');
}

// ============================================================================
// Language Configuration
// ============================================================================

/**
 * File extensions the extractor parses, mapped to language identifiers.
 */
export const EXTENSION_TO_LANGUAGE: Record<string, string> = {
	'.py': 'python',
	'.js': 'javascript',
	'.jsx': 'javascript',
	'.mjs': 'javascript',
	'.cjs': 'javascript',
	'.ts': 'typescript',
	'.mts': 'typescript',
	'.cts': 'typescript',
	'.tsx': 'tsx',
	'.go': 'go',
	'.rs': 'rust',
	'.java': 'java',
};

// ============================================================================
// Embedding Configuration
// ============================================================================

/**
 * Max concurrent API requests for HTTP embedding providers.
 */
export const CONCURRENCY = 4;
