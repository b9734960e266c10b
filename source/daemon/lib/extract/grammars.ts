/**
 * Tree-sitter grammar table for unit extraction.
 *
 * Kept free of `web-tree-sitter` imports so status output can report
 * language coverage without loading any WASM.
 */

export const SUPPORTED_LANGUAGES = [
	'python',
	'javascript',
	'typescript',
	'tsx',
	'go',
	'rust',
	'java',
] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export function isSupportedLanguage(value: string): value is SupportedLanguage {
	return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

/**
 * WASM files shipped in tree-sitter-wasms/out/.
 */
export const LANGUAGE_WASM_FILES: Record<SupportedLanguage, string> = {
	python: 'tree-sitter-python.wasm',
	javascript: 'tree-sitter-javascript.wasm',
	typescript: 'tree-sitter-typescript.wasm',
	tsx: 'tree-sitter-tsx.wasm',
	go: 'tree-sitter-go.wasm',
	rust: 'tree-sitter-rust.wasm',
	java: 'tree-sitter-java.wasm',
};

/**
 * Top-level function nodes.
 */
export const FUNCTION_NODE_TYPES: Record<SupportedLanguage, readonly string[]> = {
	python: ['function_definition'],
	javascript: ['function_declaration', 'generator_function_declaration', 'arrow_function', 'function_expression'],
	typescript: ['function_declaration', 'generator_function_declaration', 'arrow_function', 'function_expression'],
	tsx: ['function_declaration', 'generator_function_declaration', 'arrow_function', 'function_expression'],
	go: ['function_declaration'],
	rust: ['function_item'],
	java: [],
};

/**
 * Nodes emitted as `class` units; their methods are qualified by name.
 */
export const CLASS_NODE_TYPES: Record<SupportedLanguage, readonly string[]> = {
	python: ['class_definition'],
	javascript: ['class_declaration'],
	typescript: ['class_declaration', 'abstract_class_declaration', 'interface_declaration'],
	tsx: ['class_declaration', 'abstract_class_declaration', 'interface_declaration'],
	go: ['type_spec'],
	rust: ['struct_item', 'enum_item', 'trait_item'],
	java: ['class_declaration', 'interface_declaration', 'enum_declaration', 'record_declaration'],
};

/**
 * Nodes that only supply a qualifying name for the methods inside them.
 */
export const CONTEXT_NODE_TYPES: Record<SupportedLanguage, readonly string[]> = {
	python: [],
	javascript: [],
	typescript: [],
	tsx: [],
	go: [],
	rust: ['impl_item'],
	java: [],
};

export const METHOD_NODE_TYPES: Record<SupportedLanguage, readonly string[]> = {
	python: ['function_definition'],
	javascript: ['method_definition'],
	typescript: ['method_definition', 'method_signature', 'abstract_method_signature'],
	tsx: ['method_definition', 'method_signature', 'abstract_method_signature'],
	go: ['method_declaration'],
	rust: ['function_item', 'function_signature_item'],
	java: ['method_declaration', 'constructor_declaration'],
};
