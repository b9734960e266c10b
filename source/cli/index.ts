#!/usr/bin/env node
import meow from 'meow';
import {ensureDaemonRunning} from '../client/index.js';
import {getCanonicalProjectRoot} from '../daemon/lib/constants.js';
import {combineLoggers, createConsoleLogger} from '../daemon/lib/logger.js';
import {runIndexCommand, runSearchCommand, runStatusCommand} from './commands/handlers.js';
import {createCliLogger, processOutput, reportCliError} from './utils/error-handler.js';

const cli = meow(
	`
	Usage
	  $ codeloupe <command> [options]

	Commands
	  index            Build or update the semantic index
	  search <query>   Search the index
	  status           Show index and daemon status
	  daemon           Start the background daemon for this project

	Options
	  --rebuild        Re-embed every unit (index)
	  --backend        auto | single-vector | multi-vector (index)
	  --language       Only index files of this language (index)
	  --limit, -n      Maximum results (search, default 10)
	  --no-daemon      Run in this process even if a daemon is running
	  --verbose        Log to stderr

	Examples
	  $ codeloupe index --backend single-vector
	  $ codeloupe search "parse config file" -n 5
`,
	{
		importMeta: import.meta,
		flags: {
			rebuild: {type: 'boolean', default: false},
			backend: {type: 'string', default: 'auto'},
			language: {type: 'string'},
			limit: {type: 'number', shortFlag: 'n', default: 10},
			daemon: {type: 'boolean', default: true},
			verbose: {type: 'boolean', default: false},
		},
	},
);

async function main(): Promise<number> {
	const projectRoot = getCanonicalProjectRoot(process.cwd());
	const fileLogger = createCliLogger(projectRoot);
	const logger = cli.flags.verbose
		? combineLoggers(fileLogger, createConsoleLogger('debug'))
		: fileLogger;
	const ctx = {
		projectRoot,
		output: processOutput,
		logger,
		inProcess: !cli.flags.daemon,
	};

	const [command, ...rest] = cli.input;
	try {
		switch (command) {
			case 'index':
				await runIndexCommand(ctx, {
					rebuild: cli.flags.rebuild,
					backend: cli.flags.backend,
					language: cli.flags.language,
				});
				return 0;
			case 'search': {
				const query = rest.join(' ').trim();
				if (!query) {
					processOutput.err('Usage: codeloupe search <query>');
					return 2;
				}
				await runSearchCommand(ctx, query, cli.flags.limit);
				return 0;
			}
			case 'status':
				await runStatusCommand(ctx);
				return 0;
			case 'daemon':
				await ensureDaemonRunning(projectRoot);
				processOutput.out('Daemon running');
				return 0;
			default:
				return cli.showHelp(command ? 2 : 0);
		}
	} catch (error) {
		return reportCliError('CLI', error, processOutput, logger);
	}
}

main().then(
	code => {
		process.exitCode = code;
	},
	(error: unknown) => {
		process.exitCode = reportCliError('CLI', error, processOutput);
	},
);
