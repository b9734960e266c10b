/**
 * CLI commands: output formatting, error reporting, and routing through a
 * running daemon versus in-process execution.
 */

import fs from 'node:fs/promises';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {DaemonRequestError} from '../../client/connection.js';
import {createHandlers} from '../../daemon/handlers.js';
import {DEFAULT_CONFIG} from '../../daemon/lib/config.js';
import {
	getDaemonPidPath,
	getDaemonSocketPath,
	getProjectDataDir,
	getRunDir,
} from '../../daemon/lib/constants.js';
import {
	BuildInProgressError,
	DependencyMissingError,
	IndexNotFoundError,
	InvalidArgumentError,
} from '../../daemon/lib/errors.js';
import {createNullLogger} from '../../daemon/lib/logger.js';
import {DaemonOwner} from '../../daemon/owner.js';
import {ErrorCodes} from '../../daemon/protocol.js';
import {DaemonServer} from '../../daemon/server.js';
import {
	StaticUnitSource,
	VocabularyEmbedder,
	createTempDir,
	makeUnit,
	type TestContext,
} from '../../daemon/__tests__/helpers.js';
import {
	formatAvailability,
	formatIndexInfo,
	formatIndexStats,
	formatSearchResult,
	runIndexCommand,
	runSearchCommand,
	runStatusCommand,
	type CommandContext,
} from '../commands/handlers.js';
import {reportCliError, type CliOutput} from '../utils/error-handler.js';

class RecordingOutput implements CliOutput {
	lines: string[] = [];
	errors: string[] = [];

	out(line: string): void {
		this.lines.push(line);
	}

	err(line: string): void {
		this.errors.push(line);
	}
}

const logger = createNullLogger();

describe('formatting', () => {
	it('summarises index stats', () => {
		const stats = {
			backend: 'multi-vector',
			embedModel: 'colbert-test',
			totalFiles: 3,
			totalUnits: 12,
			new: 2,
			updated: 1,
			unchanged: 9,
			deleted: 4,
			fullRebuild: true,
			forcedRebuild: true,
			durationMs: 5,
		};
		expect(formatIndexStats(stats)).toEqual([
			'Indexed 12 units from 3 files with multi-vector (colbert-test)',
			'new 2, updated 1, unchanged 9, deleted 4',
			'Full rebuild (forced by rebuild thresholds)',
		]);
		expect(formatIndexStats({...stats, forcedRebuild: false, fullRebuild: false})).toHaveLength(2);
	});

	it('renders one line per search result', () => {
		expect(
			formatSearchResult({
				unitId: 'u1',
				score: 0.5,
				name: 'run',
				kind: 'function',
				filePath: 'src/a.py',
				line: 3,
				signature: 'def run()',
			}),
		).toBe('0.5000  src/a.py:3  function run');
	});

	it('describes index info and backend availability', () => {
		expect(formatIndexInfo(null)).toEqual(['No index found. Run `codeloupe index` first.']);
		expect(
			formatIndexInfo({
				backend: 'single-vector',
				embedModel: 'm',
				dimension: null,
				count: 0,
				indexPath: '/idx/vector',
				extra: {},
			}),
		).toEqual([
			'Backend: single-vector',
			'Model: m',
			'Dimension: n/a',
			'Units: 0',
			'Path: /idx/vector',
		]);
		expect(
			formatAvailability({
				'single-vector': {available: true, packages: ['fastembed']},
				'multi-vector': {available: false, packages: ['@huggingface/transformers']},
			}),
		).toEqual([
			'single-vector: available',
			'multi-vector: unavailable (npm install @huggingface/transformers)',
		]);
	});
});

describe('reportCliError', () => {
	it('prints expected index states without a stack', () => {
		const output = new RecordingOutput();
		expect(reportCliError('CLI', new IndexNotFoundError(), output)).toBe(1);
		expect(reportCliError('CLI', new BuildInProgressError('/idx'), output)).toBe(75);
		expect(output.lines).toEqual([
			'No index found. Run `codeloupe index` first.',
			'An index build is already in progress for /idx. Retry once it finishes.',
		]);
	});

	it('prints the install command for a missing package', () => {
		const output = new RecordingOutput();
		expect(
			reportCliError('CLI', new DependencyMissingError('Semantic search', ['fastembed']), output),
		).toBe(1);
		expect(output.errors).toEqual([
			'Semantic search requires fastembed. Install with: npm install fastembed',
		]);
	});

	it('maps daemon error codes', () => {
		const output = new RecordingOutput();
		const missing = new DaemonRequestError(
			'index',
			ErrorCodes.DEPENDENCY_MISSING,
			'Backend unavailable',
			{installCommand: 'npm install fastembed'},
		);
		expect(reportCliError('CLI', missing, output)).toBe(1);
		expect(output.errors).toEqual(['Backend unavailable', 'Install with: npm install fastembed']);

		const busy = new DaemonRequestError('index', ErrorCodes.BUILD_IN_PROGRESS, 'busy');
		expect(reportCliError('CLI', busy, output)).toBe(75);
		expect(output.lines).toEqual(['busy']);
	});

	it('prefixes anything else with Error:', () => {
		const output = new RecordingOutput();
		expect(reportCliError('CLI', new InvalidArgumentError('bad limit'), output)).toBe(1);
		expect(reportCliError('CLI', new Error('boom'), output, logger)).toBe(1);
		expect(reportCliError('CLI', 'text', output)).toBe(1);
		expect(output.errors).toEqual(['Error: bad limit', 'Error: boom', 'Error: text']);
	});
});

describe('commands', () => {
	let ctx: TestContext;
	let output: RecordingOutput;
	let command: CommandContext;

	beforeEach(async () => {
		ctx = await createTempDir();
		output = new RecordingOutput();
		command = {projectRoot: ctx.dir, output, logger};
	});

	afterEach(async () => {
		await fs.rm(getProjectDataDir(ctx.dir), {recursive: true, force: true});
		await fs.rm(getRunDir(ctx.dir), {recursive: true, force: true});
		await ctx.cleanup();
	});

	describe('in process', () => {
		it('reports a missing index for search', async () => {
			await expect(
				runSearchCommand({...command, inProcess: true}, 'parse', 5),
			).rejects.toBeInstanceOf(IndexNotFoundError);
			expect(output.lines).toEqual([]);
		});

		it('reports status without a daemon', async () => {
			await runStatusCommand(command);
			expect(output.lines.slice(0, 2)).toEqual([
				'Daemon: not running',
				'No index found. Run `codeloupe index` first.',
			]);
		});
	});

	describe.skipIf(process.platform === 'win32')('through the daemon', () => {
		let owner: DaemonOwner;
		let server: DaemonServer;

		beforeEach(async () => {
			owner = new DaemonOwner(ctx.dir, {
				config: {...DEFAULT_CONFIG},
				logger,
				factory: {
					probes: {canResolve: () => true},
					createEmbedder: () => new VocabularyEmbedder(),
				},
				extractor: new StaticUnitSource([
					makeUnit('start_service', {docstringSummary: 'alpha'}),
					makeUnit('stop_service', {docstringSummary: 'beta'}),
				]),
			});
			await owner.initialize();
			server = new DaemonServer(owner, {
				socketPath: getDaemonSocketPath(ctx.dir),
				pidPath: getDaemonPidPath(ctx.dir),
			});
			server.setHandlers(createHandlers());
			await server.start();
		});

		afterEach(async () => {
			await server.stop();
			await owner.shutdown();
		});

		it('indexes, searches and reports status', async () => {
			await runIndexCommand(command, {rebuild: false, backend: 'single-vector'});
			expect(output.lines).toEqual([
				'Indexed 2 units from 1 files with single-vector (test-vocab)',
				'new 2, updated 0, unchanged 0, deleted 0',
				'Full rebuild',
			]);

			output.lines = [];
			const results = await runSearchCommand(command, 'alpha', 5);
			expect(results[0]?.name).toBe('start_service');
			expect(output.lines[0]).toMatch(/^\d\.\d{4} {2}src\/start_service\.py:1 {2}function start_service$/);

			output.lines = [];
			await runStatusCommand(command);
			expect(output.lines.slice(0, 5)).toEqual([
				'Daemon: running',
				'Backend: single-vector',
				'Model: test-vocab',
				'Dimension: 25',
				'Units: 2',
			]);
		});
	});
});
