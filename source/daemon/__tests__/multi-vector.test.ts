/**
 * Multi-vector backend: late-interaction search, append-only incremental
 * updates, and the thresholds that force a full rebuild.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {BuildInProgressError, EmbeddingMismatchError} from '../lib/errors.js';
import {createNullLogger} from '../lib/logger.js';
import {
	MultiVectorBackend,
	type MultiVectorTuning,
} from '../services/backends/multi-vector/index.js';
import {PlaidIndex} from '../services/backends/multi-vector/plaid.js';
import type {CodeUnit} from '../services/types.js';
import {
	VOCABULARY,
	VOCAB_DIMENSION,
	WordTokenEncoder,
	createTempDir,
	deferred,
	makeUnit,
	pathExists,
	type Deferred,
	type TestContext,
} from './helpers.js';

const logger = createNullLogger();

/**
 * Blocks document encoding until released; queries pass straight through.
 */
class GatedEncoder extends WordTokenEncoder {
	gate: Deferred | null = null;
	readonly entered = deferred();

	override async encodeDocuments(texts: string[]): Promise<Float32Array[][]> {
		if (this.gate) {
			this.entered.resolve();
			await this.gate.promise;
		}
		return super.encodeDocuments(texts);
	}
}

class DroppingEncoder extends WordTokenEncoder {
	override async encodeDocuments(texts: string[]): Promise<Float32Array[][]> {
		return (await super.encodeDocuments(texts)).slice(1);
	}
}

/** Ten units, each described by one vocabulary word */
const UNITS: CodeUnit[] = VOCABULARY.slice(0, 10).map(word => makeUnit(`${word}_fn`));
const TEXTS = VOCABULARY.slice(0, 10);

function word(unit: CodeUnit): string {
	return unit.name.replace(/_fn$/, '');
}

describe('MultiVectorBackend', () => {
	let ctx: TestContext;
	let indexDir: string;
	const open: MultiVectorBackend[] = [];

	function backend(
		tuning: Partial<MultiVectorTuning> = {},
		encoder = new WordTokenEncoder(),
	): MultiVectorBackend {
		const instance = new MultiVectorBackend({
			indexDir,
			logger,
			encoder,
			tuning: {poolFactor: 1, ...tuning},
		});
		open.push(instance);
		return instance;
	}

	async function seeded(tuning: Partial<MultiVectorTuning> = {}): Promise<MultiVectorBackend> {
		const writer = backend(tuning);
		await writer.build(UNITS, [...TEXTS]);
		await writer.save();
		return writer;
	}

	function extra(instance: MultiVectorBackend, key: string): unknown {
		return instance.info().extra[key];
	}

	beforeEach(async () => {
		ctx = await createTempDir();
		indexDir = path.join(ctx.dir, 'index');
	});

	afterEach(async () => {
		for (const instance of open.splice(0)) {
			await instance.close();
		}
		await ctx.cleanup();
	});

	it('round-trips through save and load', async () => {
		await seeded();

		const reader = backend();
		expect(await reader.load()).toBe(true);
		const results = await reader.search('gamma', 1);
		expect(results).toHaveLength(1);
		expect(results[0]?.name).toBe('gamma_fn');
		expect(results[0]?.score).toBeCloseTo(1, 5);

		const info = reader.info();
		expect(info.backend).toBe('multi-vector');
		expect(info.count).toBe(10);
		expect(info.dimension).toBe(VOCAB_DIMENSION);
		expect(extra(reader, 'centroids')).toBe(10);
		expect(extra(reader, 'unitsAtLastRebuild')).toBe(10);
	});

	it('leaves only the active index after a full build', async () => {
		await seeded();
		expect((await fs.readdir(path.join(indexDir, 'plaid'))).sort()).toEqual([
			'index',
			'meta.json',
		]);
	});

	it('appends changes without re-encoding unchanged units', async () => {
		const encoder = new WordTokenEncoder();
		const writer = backend({}, encoder);
		await writer.build(UNITS, [...TEXTS]);
		await writer.save();

		// Change beta -> lambda, delete kappa, add mu
		const units = [...UNITS];
		const texts = [...TEXTS];
		units[1] = {...UNITS[1], fileHash: 'hash-2'};
		texts[1] = 'lambda';
		units.pop();
		texts.pop();
		const mu = makeUnit('mu_fn');
		units.push(mu);
		texts.push('mu');

		const stats = await writer.build(units, texts);
		expect(stats).toMatchObject({
			new: 1,
			updated: 1,
			unchanged: 8,
			deleted: 1,
			forcedRebuild: false,
			fullRebuild: false,
		});
		expect(encoder.encodeCalls).toBe(2);
		await writer.save();

		const deleted = UNITS[9];
		expect((await writer.search('lambda', 1))[0]?.unitId).toBe(UNITS[1]?.id);
		expect((await writer.search('kappa', 3)).map(r => r.unitId)).not.toContain(deleted?.id);
		expect(writer.hasStoredDocument(deleted?.id ?? '')).toBe(true);
		expect(extra(writer, 'incrementalUpdates')).toBe(1);
		expect(extra(writer, 'deletedSinceRebuild')).toBe(1);

		const reader = backend();
		expect(await reader.load()).toBe(true);
		expect((await reader.search('lambda', 1))[0]?.unitId).toBe(UNITS[1]?.id);
		expect((await reader.search('mu', 1))[0]?.unitId).toBe(mu.id);
		expect(reader.hasStoredDocument(deleted?.id ?? '')).toBe(true);
		expect(extra(reader, 'incrementalUpdates')).toBe(1);
		expect(extra(reader, 'deletedSinceRebuild')).toBe(1);
	});

	it('forces a full rebuild once deletions reach the ratio', async () => {
		const writer = await seeded();
		const removed = UNITS.slice(8);

		const stats = await writer.build(UNITS.slice(0, 8), TEXTS.slice(0, 8));
		expect(stats).toMatchObject({
			new: 0,
			updated: 0,
			unchanged: 8,
			deleted: 2,
			forcedRebuild: true,
			fullRebuild: true,
		});
		await writer.save();

		expect(extra(writer, 'incrementalUpdates')).toBe(0);
		expect(extra(writer, 'deletedSinceRebuild')).toBe(0);
		expect(extra(writer, 'unitsAtLastRebuild')).toBe(8);
		expect(extra(writer, 'storedDocuments')).toBe(8);
		for (const unit of removed) {
			expect(writer.hasStoredDocument(unit.id)).toBe(false);
		}
	});

	it('forces a full rebuild once the update ceiling is reached', async () => {
		const encoder = new WordTokenEncoder();
		const writer = backend({maxIncrementalUpdates: 2}, encoder);
		await writer.build(UNITS, [...TEXTS]);
		await writer.save();

		const first = UNITS.map((unit, i) => (i === 0 ? {...unit, fileHash: 'hash-2'} : unit));
		const firstStats = await writer.build(first, ['lambda', ...TEXTS.slice(1)]);
		expect(firstStats.forcedRebuild).toBe(false);
		expect(extra(writer, 'incrementalUpdates')).toBe(1);

		const second = first.map((unit, i) => (i === 1 ? {...unit, fileHash: 'hash-2'} : unit));
		const secondTexts = ['lambda', 'mu', ...TEXTS.slice(2)];
		const secondStats = await writer.build(second, secondTexts);
		expect(secondStats).toMatchObject({forcedRebuild: false, fullRebuild: false});
		expect(extra(writer, 'incrementalUpdates')).toBe(2);

		// At the ceiling, a build with nothing to do stays a no-op
		const idle = await writer.build(second, [...secondTexts]);
		expect(idle).toMatchObject({unchanged: 10, forcedRebuild: false, fullRebuild: false});
		expect(encoder.encodeCalls).toBe(3);
		expect(extra(writer, 'incrementalUpdates')).toBe(2);

		const third = second.map((unit, i) => (i === 2 ? {...unit, fileHash: 'hash-2'} : unit));
		const thirdStats = await writer.build(third, ['lambda', 'mu', 'nu', ...TEXTS.slice(3)]);
		expect(thirdStats).toMatchObject({forcedRebuild: true, fullRebuild: true});
		expect(encoder.encodeCalls).toBe(4);
		expect(extra(writer, 'incrementalUpdates')).toBe(0);
		await writer.save();
	});

	it('encodes nothing when every file hash is unchanged', async () => {
		const encoder = new WordTokenEncoder();
		const writer = backend({}, encoder);
		await writer.build(UNITS, [...TEXTS]);
		await writer.save();
		expect(encoder.encodeCalls).toBe(1);

		const stats = await writer.build(UNITS, [...TEXTS]);
		expect(stats).toMatchObject({
			new: 0,
			updated: 0,
			unchanged: 10,
			deleted: 0,
			forcedRebuild: false,
			fullRebuild: false,
		});
		expect(encoder.encodeCalls).toBe(1);
		await writer.save();
		expect(extra(writer, 'incrementalUpdates')).toBe(0);
	});

	it('updates one of three units, then rebuilds once most are deleted', async () => {
		const encoder = new WordTokenEncoder();
		const writer = backend({rebuildDeletionRatio: 0.2}, encoder);
		const a = makeUnit('foo');
		const b = makeUnit('bar');
		const c = makeUnit('baz');
		await writer.build([a, b, c], ['def alpha(): pass', 'def beta(): pass', 'def gamma(): pass']);
		await writer.save();
		expect((await writer.search('alpha', 3))[0]?.unitId).toBe(a.id);

		const updatedA = {...a, fileHash: 'hash-2'};
		const updated = await writer.build(
			[updatedA, b, c],
			['def alpha(): return delta', 'def beta(): pass', 'def gamma(): pass'],
		);
		expect(updated).toMatchObject({new: 0, updated: 1, unchanged: 2, deleted: 0});
		await writer.save();

		const pruned = await writer.build([updatedA], ['def alpha(): return delta']);
		expect(pruned).toMatchObject({deleted: 2, forcedRebuild: true, fullRebuild: true});
		await writer.save();

		expect((await writer.search('beta', 3)).map(result => result.unitId)).not.toContain(b.id);
		expect(writer.hasStoredDocument(b.id)).toBe(false);
		expect(writer.hasStoredDocument(c.id)).toBe(false);
		expect(extra(writer, 'storedDocuments')).toBe(1);
	});

	it('keeps serving the previous snapshot while a build runs', async () => {
		const encoder = new GatedEncoder();
		const live = backend({}, encoder);
		await live.build(UNITS, [...TEXTS]);
		await live.save();
		const previousBuild = live.loadedBuildId();

		const gate = deferred();
		encoder.gate = gate;
		const units = UNITS.map((unit, i) => (i === 1 ? {...unit, fileHash: 'hash-2'} : unit));
		const building = live.build(units, ['alpha', 'lambda', ...TEXTS.slice(2)]);
		await encoder.entered.promise;

		const during = await Promise.all([live.search('beta', 1), live.search('gamma', 1)]);
		expect(during[0][0]?.unitId).toBe(UNITS[1]?.id);
		expect(during[0][0]?.score).toBeCloseTo(1, 5);
		expect(during[1][0]?.unitId).toBe(UNITS[2]?.id);
		expect(live.loadedBuildId()).toBe(previousBuild);

		gate.resolve();
		await building;
		await live.save();
		expect(live.loadedBuildId()).not.toBe(previousBuild);
		expect((await live.search('lambda', 1))[0]?.unitId).toBe(UNITS[1]?.id);
	});

	it('discards rows appended by a build that never saved', async () => {
		const writer = await seeded();
		const extraUnit = makeUnit('mu_fn');
		await writer.build([...UNITS, extraUnit], [...TEXTS, 'mu']);
		// Simulate the builder dying: lock gone, sentinel left behind
		await writer.close();

		const reader = backend();
		expect(await reader.load()).toBe(false);
		expect(await reader.load()).toBe(true);
		expect(reader.info().count).toBe(10);
		expect(reader.hasStoredDocument(extraUnit.id)).toBe(false);

		const raw = await PlaidIndex.open(
			path.join(indexDir, 'plaid', 'index'),
			VOCAB_DIMENSION,
			Number.MAX_SAFE_INTEGER,
		);
		expect(raw.hasDocument(extraUnit.id)).toBe(false);
		expect(raw.documentCount).toBe(10);
	});

	it('discards an unsaved append before the next builder appends', async () => {
		await seeded();
		const beta = UNITS[1];

		// One builder appends beta -> lambda and dies before saving
		const crashed = backend();
		await crashed.build(
			UNITS.map((unit, i) => (i === 1 ? {...unit, fileHash: 'hash-2'} : unit)),
			['alpha', 'lambda', ...TEXTS.slice(2)],
		);
		await crashed.close();

		// The next one changes beta -> mu without loading first
		const next = backend();
		const stats = await next.build(
			UNITS.map((unit, i) => (i === 1 ? {...unit, fileHash: 'hash-3'} : unit)),
			['alpha', 'mu', ...TEXTS.slice(2)],
		);
		expect(stats).toMatchObject({updated: 1, unchanged: 9, fullRebuild: false});
		await next.save();
		expect(await pathExists(path.join(indexDir, 'plaid', '.build_in_progress'))).toBe(false);

		const reader = backend();
		expect(await reader.load()).toBe(true);
		const lambda = await reader.search('lambda', 10);
		expect(lambda.filter(result => result.score > 0.5)).toEqual([]);
		const mu = await reader.search('mu', 1);
		expect(mu[0]?.unitId).toBe(beta?.id);
		expect(mu[0]?.score).toBeCloseTo(1, 5);
	});

	it('takes the build lock to re-save a loaded index', async () => {
		await seeded();
		const reader = backend();
		expect(await reader.load()).toBe(true);

		const holder = backend();
		const extraUnit = makeUnit('mu_fn');
		await holder.build([...UNITS, extraUnit], [...TEXTS, 'mu']);
		await expect(reader.save()).rejects.toBeInstanceOf(BuildInProgressError);

		// Holder dies without saving; the re-save drops its appended rows
		await holder.close();
		await reader.save();
		expect(await pathExists(path.join(indexDir, 'plaid', '.build_in_progress'))).toBe(false);

		const raw = await PlaidIndex.open(
			path.join(indexDir, 'plaid', 'index'),
			VOCAB_DIMENSION,
			Number.MAX_SAFE_INTEGER,
		);
		expect(raw.hasDocument(extraUnit.id)).toBe(false);
		expect(raw.documentCount).toBe(10);
	});

	it('aborts the build when the encoder drops a document', async () => {
		const broken = backend({}, new DroppingEncoder());
		await expect(broken.build(UNITS, [...TEXTS])).rejects.toBeInstanceOf(EmbeddingMismatchError);
		expect(broken.loadedBuildId()).toBeNull();
	});

	it('does not load an index built with another encoder', async () => {
		await seeded();
		expect(await backend({}, new WordTokenEncoder('other-model')).load()).toBe(false);
	});

	it('finds units by qualified name', async () => {
		const writer = await seeded();
		expect(writer.lookupByName('gamma_fn')?.map(unit => word(unit))).toEqual(['gamma']);
		expect(writer.lookupByName('missing')).toEqual([]);
	});
});
