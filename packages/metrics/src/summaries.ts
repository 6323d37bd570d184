/**
 * Yearly Summaries
 *
 * Per (symbol, year) aggregates of rolling volatility and daily volume.
 */

import { type PricePoint, tradingYear } from "@panelstats/domain";
import { groupBy, partitionBySymbol } from "./grouping.js";
import { ROLLING_DEFAULTS, type RollingParams, rollingVolatility } from "./rolling.js";
import { maxOf, mean } from "./statistics.js";
import type { DerivedPricePoint, VolumeSummary, YearlyVolatilitySummary } from "./types.js";

export const SUMMARY_ROLLING_DEFAULTS: RollingParams = {
	...ROLLING_DEFAULTS,
	alignment: "centered",
};

/**
 * Average and peak rolling volatility per (symbol, year).
 *
 * Windows are formed within each year's returns, so a year holding fewer
 * rows than the window width has no volatility values and both aggregates
 * are null.
 */
export function summarizeYearlyVolatility(
	rows: readonly DerivedPricePoint[],
	params: RollingParams = SUMMARY_ROLLING_DEFAULTS,
): YearlyVolatilitySummary[] {
	const summaries: YearlyVolatilitySummary[] = [];

	for (const [symbol, series] of partitionBySymbol(rows)) {
		for (const [year, yearRows] of groupBy(series, (row) => tradingYear(row.date))) {
			const values = rollingVolatility(
				yearRows.map((row) => row.daily_return),
				params.window,
				params.alignment,
			).filter((value): value is number => value !== null);

			summaries.push({
				symbol,
				year,
				avg_volatility: mean(values),
				max_volatility: maxOf(values),
			});
		}
	}

	return summaries;
}

/**
 * Average and peak daily volume per (symbol, year).
 */
export function summarizeYearlyVolume(rows: readonly PricePoint[]): VolumeSummary[] {
	const summaries: VolumeSummary[] = [];

	for (const [symbol, series] of partitionBySymbol(rows)) {
		for (const [year, yearRows] of groupBy(series, (row) => tradingYear(row.date))) {
			const volumes = yearRows.map((row) => row.volume);
			summaries.push({
				symbol,
				year,
				avg_volume: mean(volumes) ?? 0,
				max_volume: maxOf(volumes) ?? 0,
			});
		}
	}

	return summaries;
}
