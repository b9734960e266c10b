/**
 * Spherical k-means over L2-normalised vectors.
 *
 * Deterministic: seeds are evenly spaced input points, so the same input
 * always yields the same centroids.
 */

import {dot, l2Normalize} from '../vectors.js';

export interface KMeansResult {
	centroids: Float32Array[];
	/** Centroid index for every input point */
	assignments: Int32Array;
}

const DEFAULT_ITERATIONS = 10;

export function kmeans(
	points: readonly Float32Array[],
	k: number,
	iterations = DEFAULT_ITERATIONS,
): KMeansResult {
	const n = points.length;
	const clusters = Math.min(Math.max(k, 0), n);
	if (clusters === 0) {
		return {centroids: [], assignments: new Int32Array(n)};
	}
	const dimension = points[0].length;

	const centroids: Float32Array[] = [];
	for (let c = 0; c < clusters; c++) {
		centroids.push(Float32Array.from(points[Math.floor((c * n) / clusters)]));
	}

	const assignments = new Int32Array(n).fill(-1);
	for (let iteration = 0; iteration < iterations; iteration++) {
		let moved = 0;
		for (let i = 0; i < n; i++) {
			const best = nearest(points[i], centroids);
			if (best !== assignments[i]) {
				assignments[i] = best;
				moved++;
			}
		}
		if (moved === 0) break;

		const sums = centroids.map(() => new Float32Array(dimension));
		const counts = new Int32Array(clusters);
		for (let i = 0; i < n; i++) {
			const sum = sums[assignments[i]];
			const point = points[i];
			for (let d = 0; d < dimension; d++) sum[d] += point[d];
			counts[assignments[i]]++;
		}
		for (let c = 0; c < clusters; c++) {
			// Empty clusters keep their previous centroid
			if (counts[c] > 0) {
				centroids[c] = l2Normalize(sums[c]);
			}
		}
	}

	return {centroids, assignments};
}

/**
 * Index of the centroid with the highest inner product.
 */
export function nearest(point: Float32Array, centroids: readonly Float32Array[]): number {
	let best = 0;
	let bestScore = -Infinity;
	for (let c = 0; c < centroids.length; c++) {
		const score = dot(point, centroids[c]);
		if (score > bestScore) {
			bestScore = score;
			best = c;
		}
	}
	return best;
}

/**
 * Reduce a document's token matrix to at most ceil(n / poolFactor) vectors
 * by clustering the tokens and mean-pooling each cluster.
 */
export function poolTokens(
	tokens: readonly Float32Array[],
	poolFactor: number,
): Float32Array[] {
	if (poolFactor <= 1 || tokens.length <= 1) {
		return tokens.map(token => Float32Array.from(token));
	}
	const target = Math.ceil(tokens.length / poolFactor);
	const {assignments} = kmeans(tokens, target);
	const dimension = tokens[0].length;

	const sums = new Map<number, Float32Array>();
	tokens.forEach((token, i) => {
		const cluster = assignments[i];
		let sum = sums.get(cluster);
		if (!sum) {
			sum = new Float32Array(dimension);
			sums.set(cluster, sum);
		}
		for (let d = 0; d < dimension; d++) sum[d] += token[d];
	});

	return [...sums.keys()]
		.sort((a, b) => a - b)
		.map(cluster => {
			const sum = sums.get(cluster) ?? new Float32Array(dimension);
			return l2Normalize(sum);
		});
}

/**
 * Number of centroids for an index over `tokenCount` tokens:
 * min(T, 2^floor(log2(16 * sqrt(T)))).
 */
export function centroidCount(tokenCount: number): number {
	if (tokenCount <= 0) return 0;
	return Math.min(
		tokenCount,
		2 ** Math.floor(Math.log2(16 * Math.sqrt(tokenCount))),
	);
}
