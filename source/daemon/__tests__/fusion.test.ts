import {describe, it, expect} from 'vitest';
import {
	IDENTIFIER_QUERY,
	RRF_K,
	hasIdentifierToken,
	reciprocalRankFusion,
} from '../services/search/fusion.js';

describe('reciprocalRankFusion', () => {
	it('rewards ids ranked by several lists', () => {
		const fused = reciprocalRankFusion(
			[
				['a', 'b'],
				['b', 'c'],
			],
			10,
		);
		expect(fused.map(entry => entry.id)).toEqual(['b', 'a', 'c']);
		expect(fused[0]?.score).toBeCloseTo(1 / (RRF_K + 2) + 1 / (RRF_K + 1), 12);
		expect(fused[1]?.score).toBeCloseTo(1 / (RRF_K + 1), 12);
	});

	it('keeps first-seen order on ties', () => {
		const fused = reciprocalRankFusion([['x'], ['y']], 10);
		expect(fused.map(entry => entry.id)).toEqual(['x', 'y']);
	});

	it('truncates to k', () => {
		expect(reciprocalRankFusion([['a', 'b', 'c']], 2)).toHaveLength(2);
		expect(reciprocalRankFusion([['a']], 0)).toEqual([]);
	});
});

describe('query classification', () => {
	it.each([
		['get_user', true],
		['config.load', true],
		['parseArgs', true],
		['find getUser callers', true],
		['parse', false],
		['how does parsing work', false],
		['HTTP', false],
		['', false],
	])('hasIdentifierToken(%j) is %s', (query, expected) => {
		expect(hasIdentifierToken(query)).toBe(expected);
	});

	it('matches whole-query identifiers only', () => {
		expect(IDENTIFIER_QUERY.test('Parser.parse')).toBe(true);
		expect(IDENTIFIER_QUERY.test('_private')).toBe(true);
		expect(IDENTIFIER_QUERY.test('load config')).toBe(false);
		expect(IDENTIFIER_QUERY.test('2fast')).toBe(false);
	});
});
