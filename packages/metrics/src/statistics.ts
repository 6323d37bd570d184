/**
 * Statistical helper functions for metric calculations
 */

/**
 * Calculate mean of an array
 *
 * @returns null for an empty array
 */
export function mean(values: readonly number[]): number | null {
	if (values.length === 0) {
		return null;
	}
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Calculate sample standard deviation (N - 1 denominator)
 *
 * @returns null when fewer than two values are given
 */
export function sampleStdDev(values: readonly number[]): number | null {
	const avg = mean(values);
	if (avg === null || values.length < 2) {
		return null;
	}

	const squaredDiffs = values.map((v) => (v - avg) ** 2);
	const variance = squaredDiffs.reduce((sum, v) => sum + v, 0) / (values.length - 1);
	const result = Math.sqrt(variance);

	// Handle floating point precision - treat very small values as 0
	return result < 1e-10 ? 0 : result;
}

export function maxOf(values: readonly number[]): number | null {
	if (values.length === 0) {
		return null;
	}
	let max = Number.NEGATIVE_INFINITY;
	for (const value of values) {
		if (value > max) {
			max = value;
		}
	}
	return max;
}

/**
 * Pearson correlation coefficient between two equal-length arrays.
 *
 * @returns null when there are fewer than two pairs or either side has zero variance
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number | null {
	if (x.length !== y.length) {
		throw new RangeError(`Arrays must have same length (${x.length} vs ${y.length})`);
	}

	const n = x.length;
	if (n < 2) {
		return null;
	}

	let sumX = 0;
	let sumY = 0;
	for (let i = 0; i < n; i++) {
		sumX += x[i] ?? 0;
		sumY += y[i] ?? 0;
	}
	const meanX = sumX / n;
	const meanY = sumY / n;

	let numerator = 0;
	let denomX = 0;
	let denomY = 0;

	for (let i = 0; i < n; i++) {
		const dx = (x[i] ?? 0) - meanX;
		const dy = (y[i] ?? 0) - meanY;
		numerator += dx * dy;
		denomX += dx * dx;
		denomY += dy * dy;
	}

	const denominator = Math.sqrt(denomX * denomY);
	if (denominator < 1e-15) {
		return null;
	}

	return Math.max(-1, Math.min(1, numerator / denominator));
}
