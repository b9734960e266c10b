/**
 * Reciprocal Rank Fusion across ranked id lists.
 */

/** RRF damping constant */
export const RRF_K = 60;

/**
 * Fuse rankings: each id scores `Σ 1 / (RRF_K + rank + 1)` over the lists it
 * appears in (rank is 0-based). Ties keep first-seen order.
 */
export function reciprocalRankFusion(
	rankings: ReadonlyArray<readonly string[]>,
	k: number,
): Array<{id: string; score: number}> {
	const scores = new Map<string, number>();
	for (const ranking of rankings) {
		ranking.forEach((id, rank) => {
			scores.set(id, (scores.get(id) ?? 0) + 1 / (RRF_K + rank + 1));
		});
	}
	return [...scores.entries()]
		.map(([id, score]) => ({id, score}))
		.sort((a, b) => b.score - a.score)
		.slice(0, Math.max(0, k));
}

/** Whole-query pattern that routes to the exact-name fast path */
export const IDENTIFIER_QUERY = /^[A-Za-z_][A-Za-z0-9_.]*$/;

/**
 * True when some whitespace-separated token reads like code rather than
 * prose: snake_case, dotted, or camelCase.
 */
export function hasIdentifierToken(query: string): boolean {
	return query
		.split(/\s+/)
		.some(
			token =>
				IDENTIFIER_QUERY.test(token) &&
				(/[A-Za-z0-9][_.][A-Za-z0-9]/.test(token) || /[a-z][A-Z]/.test(token)),
		);
}
