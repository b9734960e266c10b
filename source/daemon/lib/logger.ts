/**
 * Logger - File-based logging with hourly rotation.
 *
 * Provides multiple logger implementations:
 * - createServiceLogger: Per-service hourly rotation under the project data dir
 * - createConsoleLogger: stderr output for interactive CLI runs
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import {
	getServiceLogsDir,
	getServiceLogPath,
	type ServiceName,
} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

// ============================================================================
// Formatting
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

function createWriterLogger(
	write: (entry: string) => void,
	minLevel: LogLevel = 'debug',
): Logger {
	const emit = (
		level: LogLevel,
		component: string,
		message: string,
		extra?: object | Error,
	) => {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
		write(formatEntry(level, component, message, extra));
	};

	return {
		debug(component: string, message: string, data?: object) {
			emit('debug', component, message, data);
		},

		info(component: string, message: string, data?: object) {
			emit('info', component, message, data);
		},

		warn(component: string, message: string, data?: object) {
			emit('warn', component, message, data);
		},

		error(component: string, message: string, error?: Error) {
			emit('error', component, message, error);
		},
	};
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}

/**
 * Create a logger that writes to stderr.
 * Used by the CLI for --verbose runs so stdout stays clean for results.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
	return createWriterLogger(entry => {
		process.stderr.write(entry + '\n');
	}, minLevel);
}

/**
 * Create a service-specific logger with hourly rotation.
 *
 * Logs are written to: {projectDataDir}/logs/{service}/YYYY-MM-DD-HH.log
 *
 * @example
 * const logger = createServiceLogger('/path/to/project', 'daemon');
 * logger.error('Handler', 'Request failed', error);
 */
export function createServiceLogger(
	projectRoot: string,
	service: ServiceName,
): Logger {
	return createWriterLogger(entry => {
		try {
			// The project data dir may be removed while the daemon runs
			fs.mkdirSync(getServiceLogsDir(projectRoot, service), {recursive: true});
			fs.appendFileSync(getServiceLogPath(projectRoot, service), entry + '\n');
		} catch {
			// Logging must never take the process down
		}
	});
}

/**
 * Fan a log entry out to several loggers.
 */
export function combineLoggers(...loggers: Logger[]): Logger {
	return {
		debug(component, message, data) {
			for (const logger of loggers) logger.debug(component, message, data);
		},
		info(component, message, data) {
			for (const logger of loggers) logger.info(component, message, data);
		},
		warn(component, message, data) {
			for (const logger of loggers) logger.warn(component, message, data);
		},
		error(component, message, error) {
			for (const logger of loggers) logger.error(component, message, error);
		},
	};
}

export type {ServiceName};
