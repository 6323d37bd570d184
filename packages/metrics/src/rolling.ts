/**
 * Rolling Window Engine
 *
 * Fixed-width, step-by-one windows over one symbol's date-ordered series.
 * A windowed value is null when the window does not fit inside the series
 * or when any value inside it is null; nothing is computed from a partial
 * window.
 *
 * Alignments:
 * - trailing: window covers [t - W + 1, t]
 * - centered: window covers [t - floor((W-1)/2), t + ceil((W-1)/2)], so for
 *   W = 30 it spans 14 earlier and 15 later observations
 */

import type { RollingAlignment } from "@panelstats/config";
import { partitionBySymbol } from "./grouping.js";
import { mean, sampleStdDev } from "./statistics.js";
import type { DerivedPricePoint, RollingStat } from "./types.js";

// ============================================
// Parameters
// ============================================

export interface RollingParams {
	/** Observations per window */
	window: number;
	alignment: RollingAlignment;
}

export const ROLLING_DEFAULTS: RollingParams = {
	window: 30,
	alignment: "trailing",
};

// ============================================
// Window Mechanics
// ============================================

/**
 * Inclusive [start, end] positions of the window attributed to `index`,
 * or null when it would extend past either end of the series.
 */
export function windowBounds(
	index: number,
	length: number,
	width: number,
	alignment: RollingAlignment,
): [number, number] | null {
	const before = alignment === "trailing" ? width - 1 : Math.floor((width - 1) / 2);
	const start = index - before;
	const end = start + width - 1;

	if (start < 0 || end >= length) {
		return null;
	}
	return [start, end];
}

/**
 * Apply `statistic` to every full window of `values`.
 *
 * @throws RangeError if width is not a positive integer
 */
export function rollingApply(
	values: readonly (number | null)[],
	width: number,
	alignment: RollingAlignment,
	statistic: (window: number[]) => number | null,
): (number | null)[] {
	if (!Number.isInteger(width) || width < 1) {
		throw new RangeError(`Window width must be a positive integer, got ${width}`);
	}

	const result: (number | null)[] = [];

	for (let i = 0; i < values.length; i++) {
		const bounds = windowBounds(i, values.length, width, alignment);
		if (!bounds) {
			result.push(null);
			continue;
		}

		const window: number[] = [];
		for (let j = bounds[0]; j <= bounds[1]; j++) {
			const value = values[j];
			if (value === null || value === undefined) {
				break;
			}
			window.push(value);
		}

		result.push(window.length === width ? statistic(window) : null);
	}

	return result;
}

export function rollingVolatility(
	returns: readonly (number | null)[],
	width: number,
	alignment: RollingAlignment,
): (number | null)[] {
	return rollingApply(returns, width, alignment, sampleStdDev);
}

export function rollingMean(
	values: readonly (number | null)[],
	width: number,
	alignment: RollingAlignment,
): (number | null)[] {
	return rollingApply(values, width, alignment, mean);
}

// ============================================
// Panel Statistics
// ============================================

/**
 * Rolling volatility of daily returns and rolling mean volume for every
 * row, computed per symbol.
 */
export function calculateRollingStats(
	rows: readonly DerivedPricePoint[],
	params: RollingParams = ROLLING_DEFAULTS,
): RollingStat[] {
	const stats: RollingStat[] = [];

	for (const [symbol, series] of partitionBySymbol(rows)) {
		const volatility = rollingVolatility(
			series.map((row) => row.daily_return),
			params.window,
			params.alignment,
		);
		const volume = rollingMean(
			series.map((row) => row.volume),
			params.window,
			params.alignment,
		);

		series.forEach((row, index) => {
			stats.push({
				symbol,
				date: row.date,
				rolling_volatility: volatility[index] ?? null,
				rolling_volume: volume[index] ?? null,
			});
		});
	}

	return stats;
}
