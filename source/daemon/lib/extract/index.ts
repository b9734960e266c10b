/**
 * Unit extraction - tree-sitter based discovery of functions, classes and
 * methods.
 *
 * Uses web-tree-sitter (WASM) with the grammars from tree-sitter-wasms, so
 * no native compilation is needed.
 */

import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import {createRequire} from 'node:module';
import Parser from 'web-tree-sitter';
import type {CodeUnit, UnitKind} from '../../services/types.js';
import {EXTENSION_TO_LANGUAGE} from '../constants.js';
import type {Logger} from '../logger.js';
import {
	CLASS_NODE_TYPES,
	CONTEXT_NODE_TYPES,
	FUNCTION_NODE_TYPES,
	LANGUAGE_WASM_FILES,
	METHOD_NODE_TYPES,
	isSupportedLanguage,
	type SupportedLanguage,
} from './grammars.js';
import {isBinaryContent, scanWorkspace} from './scan.js';

export {SUPPORTED_LANGUAGES, type SupportedLanguage} from './grammars.js';

// Use createRequire to resolve WASM file paths from tree-sitter-wasms
const require = createRequire(import.meta.url);

/**
 * Wrappers between a JS/TS declaration and the comment documenting it.
 */
const DOC_WRAPPER_TYPES = new Set([
	'export_statement',
	'lexical_declaration',
	'variable_declaration',
	'variable_declarator',
	'decorated_definition',
]);

export interface ExtractOptions {
	/** Restrict to these extensions (e.g. `.py`); empty means all supported */
	extensions?: readonly string[];
	/** Restrict to one language */
	language?: string;
	onProgress?: (current: number, total: number) => void;
}

export interface ExtractionResult {
	units: CodeUnit[];
	totalFiles: number;
}

interface RawUnit {
	name: string;
	kind: UnitKind;
	startLine: number;
	endLine: number;
	signature: string;
	docstringSummary: string;
}

// ============================================================================
// Identity
// ============================================================================

export function hashContent(content: string | Buffer): string {
	return crypto.createHash('sha256').update(content).digest('hex').slice(0, 16);
}

export function computeUnitId(filePath: string, qualifiedName: string): string {
	return hashContent(`${filePath}:${qualifiedName}`);
}

/**
 * Collapse whitespace and keep the first paragraph.
 */
export function summarizeDoc(text: string): string {
	const paragraph = text.trim().split(/\n\s*\n/)[0] ?? '';
	return paragraph.replace(/\s+/g, ' ').trim();
}

/**
 * First line of a declaration without a trailing `{` or `:`.
 */
export function signatureFromLine(line: string): string {
	return line.trim().replace(/\s*[{:]\s*$/, '');
}

// ============================================================================
// Extractor
// ============================================================================

export class UnitExtractor {
	private parser: Parser | null = null;
	private readonly languages = new Map<SupportedLanguage, Parser.Language>();
	private initPromise: Promise<void> | null = null;
	private readonly logger: Logger | undefined;

	constructor(logger?: Logger) {
		this.logger = logger;
	}

	/**
	 * Initialize web-tree-sitter and load the grammars. Idempotent.
	 */
	initialize(): Promise<void> {
		if (!this.initPromise) {
			this.initPromise = this.loadGrammars().catch(error => {
				this.initPromise = null;
				throw error;
			});
		}
		return this.initPromise;
	}

	private async loadGrammars(): Promise<void> {
		await Parser.init();
		const parser = new Parser();
		const wasmBasePath = path.join(
			path.dirname(require.resolve('tree-sitter-wasms/package.json')),
			'out',
		);

		// Sequential: web-tree-sitter keeps global state while loading modules
		for (const [lang, wasmFile] of Object.entries(LANGUAGE_WASM_FILES)) {
			if (!isSupportedLanguage(lang)) continue;
			try {
				const language = await Parser.Language.load(path.join(wasmBasePath, wasmFile));
				this.languages.set(lang, language);
			} catch (error) {
				this.logger?.warn('UnitExtractor', `Failed to load ${lang} grammar`, {
					error: error instanceof Error ? error.message : String(error),
				});
			}
		}
		this.parser = parser;
	}

	languageForPath(filePath: string): SupportedLanguage | null {
		const language = EXTENSION_TO_LANGUAGE[path.extname(filePath).toLowerCase()];
		return language && isSupportedLanguage(language) ? language : null;
	}

	/**
	 * Extract units from one file's content.
	 */
	extractFile(filePath: string, content: string): CodeUnit[] {
		const parser = this.parser;
		if (!parser) {
			throw new Error('UnitExtractor not initialized. Call initialize() first.');
		}
		const language = this.languageForPath(filePath);
		if (!language) return [];

		const fileHash = hashContent(content);
		const lines = content.split('\n');
		const grammar = this.languages.get(language);
		let raw: RawUnit[] = [];
		if (grammar) {
			parser.setLanguage(grammar);
			const tree = parser.parse(content);
			if (tree) {
				try {
					this.collect(tree.rootNode, language, lines, null, raw);
				} finally {
					tree.delete();
				}
			}
		}

		if (raw.length === 0) {
			raw = [this.moduleUnit(filePath, lines)];
		}

		const seen = new Map<string, number>();
		return raw.map(unit => {
			const occurrence = (seen.get(unit.name) ?? 0) + 1;
			seen.set(unit.name, occurrence);
			const key = occurrence === 1 ? unit.name : `${unit.name}#${occurrence}`;
			return {
				id: computeUnitId(filePath, key),
				language,
				filePath,
				fileHash,
				...unit,
			};
		});
	}

	/**
	 * Scan the project and extract every unit.
	 */
	async extract(
		projectRoot: string,
		options: ExtractOptions = {},
	): Promise<ExtractionResult> {
		await this.initialize();

		const files = await scanWorkspace(projectRoot, this.selectExtensions(options));
		const units: CodeUnit[] = [];
		let current = 0;
		for (const file of files) {
			const buffer = await fs.readFile(file.absolutePath);
			current++;
			if (isBinaryContent(buffer)) {
				this.logger?.debug('UnitExtractor', 'Skipping binary file', {
					file: file.relativePath,
				});
			} else {
				units.push(...this.extractFile(file.relativePath, buffer.toString('utf-8')));
			}
			options.onProgress?.(current, files.length);
		}

		return {units, totalFiles: files.length};
	}

	private selectExtensions(options: ExtractOptions): string[] {
		const known = Object.keys(EXTENSION_TO_LANGUAGE);
		let extensions =
			options.extensions && options.extensions.length > 0
				? options.extensions.map(ext => (ext.startsWith('.') ? ext : `.${ext}`))
				: known;
		extensions = extensions.filter(ext => known.includes(ext.toLowerCase()));
		if (options.language) {
			const language = options.language;
			extensions = extensions.filter(
				ext => EXTENSION_TO_LANGUAGE[ext.toLowerCase()] === language,
			);
		}
		return extensions;
	}

	close(): void {
		this.parser?.delete();
		this.parser = null;
		this.languages.clear();
		this.initPromise = null;
	}

	// ============================================================
	// Tree traversal
	// ============================================================

	private collect(
		node: Parser.SyntaxNode,
		lang: SupportedLanguage,
		lines: string[],
		owner: string | null,
		out: RawUnit[],
	): void {
		const type = node.type;

		if (CLASS_NODE_TYPES[lang].includes(type)) {
			const name = this.nameOf(node);
			if (name) {
				out.push(this.toRaw(node, lang, lines, name, 'class'));
			}
			this.collectChildren(node, lang, lines, name || owner, out);
			return;
		}

		if (CONTEXT_NODE_TYPES[lang].includes(type)) {
			const target = node.childForFieldName('type');
			const name = target ? this.identifierIn(target) : null;
			this.collectChildren(node, lang, lines, name ?? owner, out);
			return;
		}

		if (lang === 'go' && type === 'method_declaration') {
			const receiver = node.childForFieldName('receiver');
			const receiverType = receiver ? this.identifierIn(receiver, ['type_identifier']) : null;
			const name = this.nameOf(node);
			if (name) {
				out.push(
					this.toRaw(node, lang, lines, receiverType ? `${receiverType}.${name}` : name, 'method'),
				);
			}
			return;
		}

		if (owner && METHOD_NODE_TYPES[lang].includes(type)) {
			const name = this.nameOf(node);
			if (name) {
				out.push(this.toRaw(node, lang, lines, `${owner}.${name}`, 'method'));
				return;
			}
		}

		if (!owner && FUNCTION_NODE_TYPES[lang].includes(type)) {
			const name = this.nameOf(node);
			if (name) {
				out.push(this.toRaw(node, lang, lines, name, 'function'));
				return;
			}
		}

		this.collectChildren(node, lang, lines, owner, out);
	}

	private collectChildren(
		node: Parser.SyntaxNode,
		lang: SupportedLanguage,
		lines: string[],
		owner: string | null,
		out: RawUnit[],
	): void {
		for (const child of node.namedChildren) {
			this.collect(child, lang, lines, owner, out);
		}
	}

	private toRaw(
		node: Parser.SyntaxNode,
		lang: SupportedLanguage,
		lines: string[],
		name: string,
		kind: UnitKind,
	): RawUnit {
		return {
			name,
			kind,
			startLine: node.startPosition.row + 1,
			endLine: node.endPosition.row + 1,
			signature: signatureFromLine(lines[node.startPosition.row] ?? ''),
			docstringSummary: summarizeDoc(this.docOf(node, lang) ?? ''),
		};
	}

	private moduleUnit(filePath: string, lines: string[]): RawUnit {
		const base = path.posix.basename(filePath);
		const name = base.slice(0, base.length - path.posix.extname(base).length) || base;
		return {
			name,
			kind: 'module',
			startLine: 1,
			endLine: Math.max(1, lines.length),
			signature: '',
			docstringSummary: '',
		};
	}

	// ============================================================
	// Names and docs
	// ============================================================

	private nameOf(node: Parser.SyntaxNode): string {
		const field = node.childForFieldName('name');
		if (field) return field.text;

		// const foo = () => {}
		const parent = node.parent;
		if (parent?.type === 'variable_declarator') {
			const variable = parent.childForFieldName('name');
			if (variable) return variable.text;
		}
		return '';
	}

	private identifierIn(
		node: Parser.SyntaxNode,
		types: readonly string[] = ['type_identifier', 'identifier'],
	): string | null {
		if (types.includes(node.type)) return node.text;
		for (const child of node.namedChildren) {
			const found = this.identifierIn(child, types);
			if (found) return found;
		}
		return null;
	}

	private docOf(node: Parser.SyntaxNode, lang: SupportedLanguage): string | null {
		if (lang === 'python') {
			return this.pythonDocstring(node);
		}

		// Climb wrappers (export, const declarations, decorators) to the node
		// whose previous sibling would be the doc comment
		let target: Parser.SyntaxNode = node;
		while (target.parent && DOC_WRAPPER_TYPES.has(target.parent.type)) {
			target = target.parent;
		}
		if (lang === 'go' && node.type === 'type_spec' && target.parent?.type === 'type_declaration') {
			target = target.parent;
		}

		const comments: string[] = [];
		let sibling = target.previousNamedSibling;
		let expectedRow = target.startPosition.row - 1;
		while (sibling && sibling.type.includes('comment') && sibling.endPosition.row >= expectedRow) {
			comments.unshift(cleanComment(sibling.text));
			expectedRow = sibling.startPosition.row - 1;
			sibling = sibling.previousNamedSibling;
		}
		return comments.length > 0 ? comments.join('\n') : null;
	}

	private pythonDocstring(node: Parser.SyntaxNode): string | null {
		const body = node.childForFieldName('body');
		const first = body?.namedChildren[0];
		if (first?.type !== 'expression_statement') return null;
		const literal = first.namedChildren[0];
		if (literal?.type !== 'string') return null;
		return literal.text
			.replace(/^[rRuUbBfF]*("""|'''|"|')/, '')
			.replace(/("""|'''|"|')$/, '');
	}
}

/**
 * Strip comment markers: `//`, `///`, `//!`, `#`, and block `/* *\/` framing.
 */
export function cleanComment(text: string): string {
	if (text.startsWith('/*')) {
		return text
			.replace(/^\/\*\*?/, '')
			.replace(/\*\/$/, '')
			.replace(/^\s*\* ?/gm, '')
			.trim();
	}
	return text.replace(/^(\/\/[/!]?|#)\s?/, '').trim();
}
