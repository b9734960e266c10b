/**
 * Unit extraction across languages, plus the workspace scan.
 */

import {describe, it, expect, beforeAll, afterAll, beforeEach, afterEach} from 'vitest';
import {
	UnitExtractor,
	cleanComment,
	computeUnitId,
	hashContent,
	signatureFromLine,
	summarizeDoc,
} from '../lib/extract/index.js';
import {addFile, createTempDir, type TestContext} from './helpers.js';

describe('extraction helpers', () => {
	it('keeps the first paragraph of a doc with whitespace collapsed', () => {
		expect(summarizeDoc('  First line\n  continues.\n\nSecond paragraph.')).toBe(
			'First line continues.',
		);
		expect(summarizeDoc('')).toBe('');
	});

	it('drops a trailing brace or colon from a declaration line', () => {
		expect(signatureFromLine('  def run(self):  ')).toBe('def run(self)');
		expect(signatureFromLine('fn main() {')).toBe('fn main()');
		expect(signatureFromLine('const x = 1;')).toBe('const x = 1;');
	});

	it('strips comment markers', () => {
		expect(cleanComment('/// Doc line')).toBe('Doc line');
		expect(cleanComment('//! Crate doc')).toBe('Crate doc');
		expect(cleanComment('# hash comment')).toBe('hash comment');
		expect(cleanComment('/**\n * One.\n * Two.\n */')).toBe('One.\nTwo.');
	});

	it('derives stable ids from path and qualified name', () => {
		expect(computeUnitId('a.py', 'f')).toBe(hashContent('a.py:f'));
		expect(computeUnitId('a.py', 'f')).toHaveLength(16);
		expect(computeUnitId('b.py', 'f')).not.toBe(computeUnitId('a.py', 'f'));
	});
});

describe('UnitExtractor', () => {
	const extractor = new UnitExtractor();

	beforeAll(async () => {
		await extractor.initialize();
	});

	afterAll(() => {
		extractor.close();
	});

	it('refuses to parse before initialization', () => {
		expect(() => new UnitExtractor().extractFile('a.py', 'x = 1')).toThrow(
			'UnitExtractor not initialized',
		);
	});

	it('extracts python classes, methods and functions with docstrings', () => {
		const source = [
			'class Parser:',
			'    """Parses config files."""',
			'',
			'    marker = 1',
			'',
			'    def parse(self, text):',
			'        """Parse text."""',
			'        return text',
			'',
			'',
			'def load_config(path):',
			'    return Parser().parse(path)',
			'',
		].join('\n');

		const units = extractor.extractFile('src/parser.py', source);
		expect(
			units.map(({name, kind, startLine, endLine, signature, docstringSummary}) => ({
				name,
				kind,
				startLine,
				endLine,
				signature,
				docstringSummary,
			})),
		).toEqual([
			{
				name: 'Parser',
				kind: 'class',
				startLine: 1,
				endLine: 8,
				signature: 'class Parser',
				docstringSummary: 'Parses config files.',
			},
			{
				name: 'Parser.parse',
				kind: 'method',
				startLine: 6,
				endLine: 8,
				signature: 'def parse(self, text)',
				docstringSummary: 'Parse text.',
			},
			{
				name: 'load_config',
				kind: 'function',
				startLine: 11,
				endLine: 12,
				signature: 'def load_config(path)',
				docstringSummary: '',
			},
		]);
		expect(units[0]).toMatchObject({
			language: 'python',
			filePath: 'src/parser.py',
			fileHash: hashContent(source),
			id: computeUnitId('src/parser.py', 'Parser'),
		});
	});

	it('extracts typescript declarations with leading comments', () => {
		const source = [
			'/** Adds two numbers. */',
			'export function add(a: number, b: number): number {',
			'\treturn a + b;',
			'}',
			'',
			'// Formats a name.',
			'export const formatName = (name: string): string => name.trim();',
			'',
			'export class Greeter {',
			'\tgreet(name: string): string {',
			'\t\treturn `Hello ${name}`;',
			'\t}',
			'}',
			'',
		].join('\n');

		const units = extractor.extractFile('src/greet.ts', source);
		expect(units.map(unit => [unit.name, unit.kind])).toEqual([
			['add', 'function'],
			['formatName', 'function'],
			['Greeter', 'class'],
			['Greeter.greet', 'method'],
		]);
		expect(units[0]).toMatchObject({
			startLine: 2,
			endLine: 4,
			signature: 'export function add(a: number, b: number): number',
			docstringSummary: 'Adds two numbers.',
		});
		expect(units[1]).toMatchObject({startLine: 7, docstringSummary: 'Formats a name.'});
		expect(units[2]).toMatchObject({startLine: 9, endLine: 13, docstringSummary: ''});
		expect(units[3]?.signature).toBe('greet(name: string): string');
	});

	it('qualifies go methods by receiver type', () => {
		const source = [
			'package store',
			'',
			'// Store keeps items.',
			'type Store struct {',
			'\titems map[string]string',
			'}',
			'',
			'// Get returns an item.',
			'func (s *Store) Get(key string) string {',
			'\treturn s.items[key]',
			'}',
			'',
		].join('\n');

		const units = extractor.extractFile('store/store.go', source);
		expect(units.map(unit => [unit.name, unit.kind, unit.docstringSummary])).toEqual([
			['Store', 'class', 'Store keeps items.'],
			['Store.Get', 'method', 'Get returns an item.'],
		]);
	});

	it('qualifies rust impl methods by the implemented type', () => {
		const source = [
			'pub struct Cache {',
			'    size: usize,',
			'}',
			'',
			'impl Cache {',
			'    pub fn get(&self) -> usize {',
			'        self.size',
			'    }',
			'}',
			'',
		].join('\n');

		const units = extractor.extractFile('src/cache.rs', source);
		expect(units.map(unit => [unit.name, unit.kind])).toEqual([
			['Cache', 'class'],
			['Cache.get', 'method'],
		]);
	});

	it('falls back to one module unit when nothing is declared', () => {
		const units = extractor.extractFile('notes/readme.py', 'x = 1\n');
		expect(units).toHaveLength(1);
		expect(units[0]).toMatchObject({
			name: 'readme',
			kind: 'module',
			startLine: 1,
			endLine: 2,
			signature: '',
		});
	});

	it('gives repeated names distinct ids', () => {
		const source = 'def helper():\n    pass\n\ndef helper():\n    pass\n';
		const units = extractor.extractFile('dup.py', source);
		expect(units.map(unit => unit.id)).toEqual([
			computeUnitId('dup.py', 'helper'),
			computeUnitId('dup.py', 'helper#2'),
		]);
	});

	it('ignores files in unsupported languages', () => {
		expect(extractor.extractFile('README.md', '# Title')).toEqual([]);
	});

	describe('extract', () => {
		let ctx: TestContext;

		beforeEach(async () => {
			ctx = await createTempDir();
			await addFile(ctx.dir, '.gitignore', 'gen/\n');
			await addFile(ctx.dir, 'src/run.py', 'def run():\n    pass\n');
			await addFile(ctx.dir, 'cmd/main.go', 'package main\n\nfunc main() {}\n');
			await addFile(ctx.dir, 'gen/skip.py', 'def skipped():\n    pass\n');
			await addFile(ctx.dir, 'node_modules/pkg/index.js', 'function dep() {}\n');
			await addFile(ctx.dir, 'README.md', '# Project\n');
		});

		afterEach(async () => {
			await ctx.cleanup();
		});

		it('scans the project honouring .gitignore', async () => {
			const progress: Array<[number, number]> = [];
			const result = await extractor.extract(ctx.dir, {
				onProgress: (current, total) => progress.push([current, total]),
			});
			expect(result.totalFiles).toBe(2);
			expect(result.units.map(unit => [unit.filePath, unit.name])).toEqual([
				['cmd/main.go', 'main'],
				['src/run.py', 'run'],
			]);
			expect(progress).toEqual([
				[1, 2],
				[2, 2],
			]);
		});

		it('restricts the scan to one language', async () => {
			const result = await extractor.extract(ctx.dir, {language: 'python'});
			expect(result.totalFiles).toBe(1);
			expect(result.units.map(unit => unit.name)).toEqual(['run']);
		});

		it('restricts the scan to listed extensions', async () => {
			const result = await extractor.extract(ctx.dir, {extensions: ['go']});
			expect(result.units.map(unit => unit.name)).toEqual(['main']);
		});
	});
});
