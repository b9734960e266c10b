/**
 * Atomic JSON persistence.
 *
 * Writers go through a temp file in the same directory followed by rename(),
 * so readers observe either the previous document or the new one.
 */

import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type {z} from 'zod';

/**
 * Write a JSON document atomically (temp file + rename).
 */
export async function writeJsonAtomic(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), {recursive: true});
	const tempPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
	try {
		await fs.writeFile(tempPath, JSON.stringify(data, null, '\t') + '\n');
		await fs.rename(tempPath, filePath);
	} catch (error) {
		await fs.rm(tempPath, {force: true});
		throw error;
	}
}

export type JsonReadResult<T> =
	| {status: 'ok'; value: T}
	| {status: 'missing'}
	| {status: 'corrupt'; reason: string};

/**
 * Read and validate a JSON document.
 * Never throws: absence and malformed content are reported in the result.
 */
export async function readJsonFile<T>(
	filePath: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<JsonReadResult<T>> {
	let content: string;
	try {
		content = await fs.readFile(filePath, 'utf-8');
	} catch (error) {
		if (isNotFound(error)) {
			return {status: 'missing'};
		}
		return {
			status: 'corrupt',
			reason: error instanceof Error ? error.message : String(error),
		};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch {
		return {status: 'corrupt', reason: `Invalid JSON in ${filePath}`};
	}

	const result = schema.safeParse(parsed);
	if (!result.success) {
		return {
			status: 'corrupt',
			reason: `Unexpected shape in ${filePath}: ${result.error.issues
				.map(issue => `${issue.path.join('.') || '<root>'} ${issue.message}`)
				.join('; ')}`,
		};
	}
	return {status: 'ok', value: result.data};
}

export function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		(error.code === 'ENOENT' || error.code === 'ENOTDIR')
	);
}

export async function pathExists(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath);
		return true;
	} catch {
		return false;
	}
}
