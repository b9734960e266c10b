/**
 * Vector math shared by both backends.
 */

/**
 * L2-normalise in place and return the same array. Zero vectors stay zero.
 */
export function l2Normalize(vector: Float32Array): Float32Array {
	let norm = 0;
	for (let i = 0; i < vector.length; i++) {
		norm += vector[i] * vector[i];
	}
	norm = Math.sqrt(norm);
	if (norm > 0) {
		for (let i = 0; i < vector.length; i++) {
			vector[i] /= norm;
		}
	}
	return vector;
}

export function dot(a: Float32Array, b: Float32Array): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += a[i] * b[i];
	}
	return sum;
}

/**
 * Dot product of `query` against row `row` of a row-major matrix.
 */
export function dotRow(
	matrix: Float32Array,
	row: number,
	dim: number,
	query: Float32Array,
): number {
	let sum = 0;
	const offset = row * dim;
	for (let i = 0; i < dim; i++) {
		sum += matrix[offset + i] * query[i];
	}
	return sum;
}

/**
 * Indices of the `k` highest scores, best first. Ties keep index order.
 */
export function topK(scores: ArrayLike<number>, k: number): number[] {
	const order = Array.from({length: scores.length}, (_, i) => i);
	order.sort((a, b) => scores[b] - scores[a] || a - b);
	return order.slice(0, Math.max(0, k));
}

/**
 * Coerce a vector value read back from LanceDB (plain array, typed array,
 * or Arrow vector) into a Float32Array.
 */
export function normalizeVector(value: unknown): Float32Array | null {
	if (!value) return null;
	if (value instanceof Float32Array) {
		return value;
	}
	if (Array.isArray(value)) {
		return Float32Array.from(value, v => Number(v));
	}
	if (value instanceof Float64Array) {
		return Float32Array.from(value);
	}
	if (typeof value === 'object' && 'toArray' in value) {
		const toArray = value.toArray;
		if (typeof toArray === 'function') {
			return normalizeVector(toArray.call(value));
		}
	}
	return null;
}
