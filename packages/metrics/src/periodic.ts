/**
 * Periodic Aggregator
 *
 * Folds daily rows into monthly and yearly open/close bars per symbol and
 * chains period-over-period returns.
 *
 * - period open:  open of the chronologically first row in the period
 * - period close: close of the chronologically last row in the period
 * - period return: percent change of the close against the previous period's
 *   close for the same symbol; null for the symbol's first period
 *
 * Partial periods at either end of the data are aggregated from whatever rows
 * exist.
 */

import { type PricePoint, percentChange, tradingMonth, tradingYear } from "@panelstats/domain";
import { partitionBySymbol } from "./grouping.js";
import { RETURNS_DEFAULTS, type ReturnsParams } from "./returns.js";
import type { MonthlyBar, YearlyBar } from "./types.js";

interface PeriodBar {
	year: number;
	month: number;
	open: number;
	close: number;
	previousClose: number | null;
	periodReturn: number | null;
}

type PeriodOf = (date: string) => { year: number; month: number };

const byMonth: PeriodOf = (date) => ({ year: tradingYear(date), month: tradingMonth(date) });

// Month is fixed so yearly periods share one key shape
const byYear: PeriodOf = (date) => ({ year: tradingYear(date), month: 0 });

/**
 * Fold one symbol's date-ordered rows into chained period bars.
 */
function foldPeriods(series: readonly PricePoint[], periodOf: PeriodOf, decimals: number): PeriodBar[] {
	const bars: PeriodBar[] = [];
	let current: PeriodBar | undefined;

	for (const point of series) {
		const { year, month } = periodOf(point.date);

		if (current && current.year === year && current.month === month) {
			current.close = point.close;
			continue;
		}

		const previousClose: number | null = current ? current.close : null;
		current = {
			year,
			month,
			open: point.open,
			close: point.close,
			previousClose,
			periodReturn: null,
		};
		bars.push(current);
	}

	// Returns are chained once every close is final
	for (const bar of bars) {
		bar.periodReturn =
			bar.previousClose === null ? null : percentChange(bar.close, bar.previousClose, decimals);
	}

	return bars;
}

/**
 * Aggregate rows of any number of symbols into monthly bars.
 */
export function aggregateMonthly(
	rows: readonly PricePoint[],
	params: ReturnsParams = RETURNS_DEFAULTS,
): MonthlyBar[] {
	const bars: MonthlyBar[] = [];

	for (const [symbol, series] of partitionBySymbol(rows)) {
		for (const bar of foldPeriods(series, byMonth, params.decimals)) {
			bars.push({
				symbol,
				year: bar.year,
				month: bar.month,
				monthly_open: bar.open,
				monthly_close: bar.close,
				monthly_return: bar.periodReturn,
			});
		}
	}

	return bars;
}

/**
 * Aggregate rows of any number of symbols into yearly bars.
 */
export function aggregateYearly(
	rows: readonly PricePoint[],
	params: ReturnsParams = RETURNS_DEFAULTS,
): YearlyBar[] {
	const bars: YearlyBar[] = [];

	for (const [symbol, series] of partitionBySymbol(rows)) {
		for (const bar of foldPeriods(series, byYear, params.decimals)) {
			bars.push({
				symbol,
				year: bar.year,
				yearly_open: bar.open,
				yearly_close: bar.close,
				previous_close: bar.previousClose,
				yearly_return: bar.periodReturn,
			});
		}
	}

	return bars;
}
