/**
 * CLI Error Handler
 *
 * Turns errors from in-process runs and daemon responses into terminal
 * output plus an exit code. Expected states (no index yet, a build already
 * running, a missing optional package) print as plain lines; anything else
 * also goes to the CLI log with its stack.
 */

import {DaemonRequestError} from '../../client/connection.js';
import {ErrorCodes} from '../../daemon/protocol.js';
import {
	BuildInProgressError,
	DependencyMissingError,
	IndexNotFoundError,
	isSearchError,
} from '../../daemon/lib/errors.js';
import {createServiceLogger, type Logger} from '../../daemon/lib/logger.js';

export interface CliOutput {
	out(line: string): void;
	err(line: string): void;
}

export const processOutput: CliOutput = {
	out: line => process.stdout.write(line + '\n'),
	err: line => process.stderr.write(line + '\n'),
};

/**
 * Create a CLI logger for the given project root.
 * Writes to <project data dir>/logs/cli/YYYY-MM-DD-HH.log
 */
export function createCliLogger(projectRoot: string): Logger {
	return createServiceLogger(projectRoot, 'cli');
}

const INSTALL_PREFIX = 'Install with: ';

/**
 * Print `error` and return the process exit code.
 */
export function reportCliError(
	component: string,
	error: unknown,
	output: CliOutput,
	logger?: Logger | null,
): number {
	if (error instanceof IndexNotFoundError) {
		output.out(error.message);
		return 1;
	}
	if (error instanceof DependencyMissingError) {
		output.err(error.message);
		return 1;
	}
	if (error instanceof BuildInProgressError) {
		output.out(error.message);
		return 75;
	}
	if (isSearchError(error)) {
		output.err(`Error: ${error.message}`);
		return 1;
	}

	if (error instanceof DaemonRequestError) {
		switch (error.code) {
			case ErrorCodes.INDEX_NOT_FOUND:
				output.out(error.message);
				return 1;
			case ErrorCodes.BUILD_IN_PROGRESS:
				output.out(error.message);
				return 75;
			case ErrorCodes.DEPENDENCY_MISSING: {
				output.err(error.message);
				const command = installCommandOf(error.data);
				if (command && !error.message.includes(INSTALL_PREFIX)) {
					output.err(`${INSTALL_PREFIX}${command}`);
				}
				return 1;
			}
			default:
				break;
		}
	}

	const err = error instanceof Error ? error : new Error(String(error));
	logger?.error(component, err.message, err);
	output.err(`Error: ${err.message}`);
	return 1;
}

function installCommandOf(data: unknown): string | null {
	if (typeof data !== 'object' || data === null) return null;
	const command: unknown = Reflect.get(data, 'installCommand');
	return typeof command === 'string' ? command : null;
}
