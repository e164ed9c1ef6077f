/**
 * Vector helpers for similarity search and clustering
 */

/**
 * Cosine of the angle between two vectors; 0 when either is all zeros
 *
 * @throws Error if the vectors have different dimensions
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new Error(`Vectors must have the same dimensions (got ${a.length} and ${b.length})`);
	}

	let dotProduct = 0;
	let magnitudeA = 0;
	let magnitudeB = 0;

	for (let i = 0; i < a.length; i++) {
		dotProduct += a[i] * b[i];
		magnitudeA += a[i] * a[i];
		magnitudeB += b[i] * b[i];
	}

	const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);
	if (magnitude === 0) {
		return 0;
	}

	return dotProduct / magnitude;
}

/**
 * Unit-length copy; a zero vector is returned unchanged
 */
export function normalizeVector(vector: readonly number[]): number[] {
	const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
	if (norm === 0) {
		return [...vector];
	}
	return vector.map((value) => value / norm);
}

/**
 * Rounds to a fixed number of decimals for stable output
 */
export function roundTo(value: number, decimals: number = 4): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}
