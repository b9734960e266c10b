/**
 * Test helpers: temp projects, unit factories, and deterministic encoders.
 *
 * The encoders map each word of a fixed vocabulary to its own dimension, so
 * similarity scores in tests are exact and survive a reload by a fresh
 * instance. Words outside the vocabulary share one trailing dimension.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type {ExtractOptions, ExtractionResult} from '../lib/extract/index.js';
import type {EmbeddingProvider, TokenEncoder} from '../providers/types.js';
import type {UnitSource} from '../services/indexing.js';
import type {CodeUnit} from '../services/types.js';

/** Temp directory prefix for test projects */
const TEMP_PREFIX = 'codeloupe-test-';

/** Test context with temp directory and cleanup */
export interface TestContext {
	dir: string;
	cleanup: () => Promise<void>;
}

export async function createTempDir(): Promise<TestContext> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX));
	return {
		dir,
		cleanup: async () => {
			await fs.rm(dir, {recursive: true, force: true});
		},
	};
}

/**
 * Add (or overwrite) a file in the temp project.
 */
export async function addFile(
	projectRoot: string,
	relativePath: string,
	content: string,
): Promise<void> {
	const fullPath = path.join(projectRoot, relativePath);
	await fs.mkdir(path.dirname(fullPath), {recursive: true});
	await fs.writeFile(fullPath, content);
}

export async function pathExists(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath);
		return true;
	} catch {
		return false;
	}
}

// ============================================================================
// Units
// ============================================================================

export function makeUnit(name: string, overrides: Partial<CodeUnit> = {}): CodeUnit {
	return {
		id: `unit:${name}`,
		name,
		kind: 'function',
		language: 'python',
		filePath: `src/${name}.py`,
		startLine: 1,
		endLine: 3,
		signature: `def ${name}()`,
		docstringSummary: '',
		fileHash: 'hash-1',
		...overrides,
	};
}

/**
 * Unit source that serves a fixed list as if scanned from one file.
 */
export class StaticUnitSource implements UnitSource {
	closed = false;

	constructor(private readonly units: CodeUnit[]) {}

	async extract(_projectRoot: string, options?: ExtractOptions): Promise<ExtractionResult> {
		options?.onProgress?.(1, 1);
		return {units: this.units, totalFiles: 1};
	}

	close(): void {
		this.closed = true;
	}
}

// ============================================================================
// Deterministic encoders
// ============================================================================

export const VOCABULARY: readonly string[] = [
	'alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'eta', 'theta',
	'iota', 'kappa', 'lambda', 'mu', 'nu', 'xi', 'omicron', 'pi',
	'rho', 'sigma', 'tau', 'upsilon', 'phi', 'chi', 'psi', 'omega',
];

/** Vocabulary plus one shared slot for unknown words */
export const VOCAB_DIMENSION = VOCABULARY.length + 1;

export function wordsOf(text: string): string[] {
	return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function slotOf(word: string): number {
	const index = VOCABULARY.indexOf(word);
	return index === -1 ? VOCABULARY.length : index;
}

/**
 * Word counts over the vocabulary. Text with no words lands on the
 * unknown slot so the vector is never zero.
 */
export function bagOfWords(text: string): number[] {
	const vector = new Array<number>(VOCAB_DIMENSION).fill(0);
	const words = wordsOf(text);
	for (const word of words) {
		vector[slotOf(word)] += 1;
	}
	if (words.length === 0) {
		vector[VOCABULARY.length] = 1;
	}
	return vector;
}

export function oneHot(slot: number): Float32Array {
	const vector = new Float32Array(VOCAB_DIMENSION);
	vector[slot] = 1;
	return vector;
}

/**
 * Dense embedder: bag of words over VOCABULARY. Records every batch.
 */
export class VocabularyEmbedder implements EmbeddingProvider {
	readonly model: string;
	embedCalls = 0;
	embeddedTexts: string[] = [];

	constructor(model = 'test-vocab') {
		this.model = model;
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		this.embedCalls++;
		this.embeddedTexts.push(...texts);
		return texts.map(bagOfWords);
	}

	async embedQuery(text: string): Promise<number[]> {
		return bagOfWords(text);
	}

	close(): void {}
}

/**
 * Token encoder: one one-hot vector per word.
 */
export class WordTokenEncoder implements TokenEncoder {
	readonly model: string;
	encodeCalls = 0;

	constructor(model = 'test-tokens') {
		this.model = model;
	}

	async initialize(): Promise<void> {}

	async encodeDocuments(texts: string[]): Promise<Float32Array[][]> {
		this.encodeCalls++;
		return texts.map(text => wordsOf(text).map(word => oneHot(slotOf(word))));
	}

	async encodeQuery(text: string): Promise<Float32Array[]> {
		return wordsOf(text).map(word => oneHot(slotOf(word)));
	}

	close(): void {}
}

// ============================================================================
// Async control
// ============================================================================

export interface Deferred {
	promise: Promise<void>;
	resolve: () => void;
}

export function deferred(): Deferred {
	let resolve: () => void = () => {};
	const promise = new Promise<void>(done => {
		resolve = done;
	});
	return {promise, resolve};
}
