/**
 * CLI command implementations.
 *
 * Each command goes through the project's daemon when one is serving and
 * runs in process otherwise. Output is plain lines.
 */

import {DaemonClient, isDaemonRunning} from '../../client/index.js';
import type {ClientStatus, IndexProgressEvent} from '../../client/index.js';
import {loadConfig} from '../../daemon/lib/config.js';
import type {Logger} from '../../daemon/lib/logger.js';
import {probeBackends} from '../../daemon/services/backends/factory.js';
import type {BackendInfo} from '../../daemon/services/backends/types.js';
import {buildIndex, getIndexInfo, searchIndex} from '../../daemon/services/indexing.js';
import type {IndexStats, SearchResult} from '../../daemon/services/types.js';
import type {CliOutput} from '../utils/error-handler.js';

export interface CommandContext {
	projectRoot: string;
	output: CliOutput;
	logger: Logger;
	/** Skip the daemon even when one is running */
	inProcess?: boolean;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatIndexStats(stats: IndexStats): string[] {
	const lines = [
		`Indexed ${stats.totalUnits} units from ${stats.totalFiles} files with ${stats.backend} (${stats.embedModel})`,
		`new ${stats.new}, updated ${stats.updated}, unchanged ${stats.unchanged}, deleted ${stats.deleted}`,
	];
	if (stats.forcedRebuild) {
		lines.push('Full rebuild (forced by rebuild thresholds)');
	} else if (stats.fullRebuild) {
		lines.push('Full rebuild');
	}
	return lines;
}

export function formatSearchResult(result: SearchResult): string {
	return `${result.score.toFixed(4)}  ${result.filePath}:${result.line}  ${result.kind} ${result.name}`;
}

export function formatIndexInfo(info: BackendInfo | null): string[] {
	if (!info) {
		return ['No index found. Run `codeloupe index` first.'];
	}
	return [
		`Backend: ${info.backend}`,
		`Model: ${info.embedModel}`,
		`Dimension: ${info.dimension ?? 'n/a'}`,
		`Units: ${info.count}`,
		`Path: ${info.indexPath}`,
	];
}

export function formatAvailability(
	availability: ClientStatus['availability'],
): string[] {
	return Object.entries(availability).map(([kind, probe]) =>
		probe.available
			? `${kind}: available`
			: `${kind}: unavailable (npm install ${probe.packages.join(' ')})`,
	);
}

// ============================================================================
// Daemon routing
// ============================================================================

async function withDaemon<T>(
	ctx: CommandContext,
	run: (client: DaemonClient) => Promise<T>,
): Promise<{ok: true; value: T} | {ok: false}> {
	if (ctx.inProcess || !(await isDaemonRunning(ctx.projectRoot))) {
		return {ok: false};
	}
	const client = new DaemonClient(ctx.projectRoot);
	try {
		await client.connect();
	} catch (error) {
		// Daemon went away between the check and the connect
		ctx.logger.debug('CLI', 'Daemon connect failed, running in process', {
			error: error instanceof Error ? error.message : String(error),
		});
		return {ok: false};
	}
	try {
		return {ok: true, value: await run(client)};
	} finally {
		await client.disconnect();
	}
}

// ============================================================================
// Commands
// ============================================================================

export interface IndexCommandOptions {
	rebuild: boolean;
	backend?: string;
	language?: string;
}

export async function runIndexCommand(
	ctx: CommandContext,
	options: IndexCommandOptions,
): Promise<IndexStats> {
	const viaDaemon = await withDaemon(ctx, client => {
		client.on('indexProgress', (event: IndexProgressEvent) => {
			ctx.logger.debug('CLI', `${event.stage} ${event.current}/${event.total}`);
		});
		return client.index(options);
	});
	const stats = viaDaemon.ok
		? viaDaemon.value
		: await buildIndex(ctx.projectRoot, {
				logger: ctx.logger,
				rebuild: options.rebuild,
				backendKind: options.backend,
				language: options.language,
			});

	for (const line of formatIndexStats(stats)) {
		ctx.output.out(line);
	}
	return stats;
}

export async function runSearchCommand(
	ctx: CommandContext,
	query: string,
	limit: number,
): Promise<SearchResult[]> {
	const viaDaemon = await withDaemon(ctx, client => client.search(query, limit));
	const results = viaDaemon.ok
		? viaDaemon.value
		: await searchIndex(ctx.projectRoot, query, {logger: ctx.logger, limit});

	if (results.length === 0) {
		ctx.output.out('No results.');
	}
	for (const result of results) {
		ctx.output.out(formatSearchResult(result));
	}
	return results;
}

export async function runStatusCommand(ctx: CommandContext): Promise<void> {
	const viaDaemon = await withDaemon(ctx, client => client.status());
	if (viaDaemon.ok) {
		const status = viaDaemon.value;
		ctx.output.out('Daemon: running');
		for (const line of formatIndexInfo(status.index)) ctx.output.out(line);
		for (const line of formatAvailability(status.availability)) ctx.output.out(line);
		if (status.indexing.status === 'indexing') {
			ctx.output.out(`Indexing: ${status.indexing.stage} (${status.indexing.percent}%)`);
		}
		return;
	}

	const config = await loadConfig(ctx.projectRoot);
	const info = await getIndexInfo(ctx.projectRoot, {config, logger: ctx.logger});
	ctx.output.out('Daemon: not running');
	for (const line of formatIndexInfo(info)) ctx.output.out(line);
	for (const line of formatAvailability(probeBackends(config))) ctx.output.out(line);
}
