/**
 * Workspace scanning: which files the extractor should look at.
 *
 * fast-glob lists candidate files (skipping always-ignored directories up
 * front); .gitignore rules are then applied with the `ignore` package.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {createRequire} from 'node:module';
import fg from 'fast-glob';

// ignore is a CJS module, use createRequire to import it
const require = createRequire(import.meta.url);
const ignore = require('ignore') as () => Ignore;

interface Ignore {
	add(patterns: string | string[]): this;
	ignores(pathname: string): boolean;
}

/**
 * Directories never scanned, whatever .gitignore says.
 */
const ALWAYS_IGNORED = ['.git', 'node_modules', '.venv', '__pycache__', 'dist'];

export interface ScannedFile {
	/** Project-relative, `/` separators */
	relativePath: string;
	absolutePath: string;
}

/**
 * Load .gitignore rules from the project root (plus the always-ignored set).
 */
export async function loadGitignore(projectRoot: string): Promise<Ignore> {
	const ig = ignore();
	ig.add(ALWAYS_IGNORED);
	try {
		ig.add(await fs.readFile(path.join(projectRoot, '.gitignore'), 'utf-8'));
	} catch {
		// No .gitignore
	}
	return ig;
}

/**
 * List source files with one of `extensions` (e.g. `.py`), sorted by path.
 * Symlinks are skipped.
 */
export async function scanWorkspace(
	projectRoot: string,
	extensions: readonly string[],
): Promise<ScannedFile[]> {
	if (extensions.length === 0) return [];

	const gitignore = await loadGitignore(projectRoot);
	const suffixes = extensions.map(ext => ext.replace(/^\./, ''));
	const pattern =
		suffixes.length === 1 ? `**/*.${suffixes[0]}` : `**/*.{${suffixes.join(',')}}`;

	const files = await fg(pattern, {
		cwd: projectRoot,
		dot: true,
		onlyFiles: true,
		followSymbolicLinks: false,
		ignore: ALWAYS_IGNORED.map(dir => `**/${dir}/**`),
	});

	const scanned: ScannedFile[] = [];
	for (const file of files.map(normalizePath).sort()) {
		if (gitignore.ignores(file)) continue;
		const absolutePath = path.join(projectRoot, file);
		const stats = await fs.lstat(absolutePath);
		if (stats.isSymbolicLink() || !stats.isFile()) continue;
		scanned.push({relativePath: file, absolutePath});
	}
	return scanned;
}

/**
 * True when the content looks binary (NUL byte in the first 8KB).
 */
export function isBinaryContent(content: Buffer): boolean {
	return content.subarray(0, 8192).includes(0);
}

function normalizePath(file: string): string {
	return file.split(path.sep).join('/');
}
