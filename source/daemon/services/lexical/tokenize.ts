/**
 * Tokenizer shared by indexing and querying the lexical index.
 *
 * `getUserName` and `get_user_name` both become `get user name`; LanceDB's
 * FTS tokenizer then splits on spaces.
 */
export function tokenizeForBm25(text: string): string {
	const tokens = text
		.replace(/([a-z])([A-Z])/g, '$1 $2')
		.toLowerCase()
		.match(/[a-z0-9]+/g);
	return tokens ? tokens.join(' ') : '';
}
