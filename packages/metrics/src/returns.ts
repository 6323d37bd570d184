/**
 * Returns Calculator
 *
 * Daily percent return of the adjusted close, lagged within each symbol.
 *
 * Formula:
 *   daily_return[t] = round((adjusted[t] / adjusted[t-1] - 1) * 100, decimals)
 *
 * The first valid row of every symbol has no predecessor and gets null.
 * Rows that fail screening are reported and skipped: the next valid row
 * lags against the last valid one, never against a rejected row.
 */

import {
	isRowRejected,
	percentChange,
	type PricePoint,
	type RawPricePoint,
	type RowIssue,
	screenPricePoint,
} from "@panelstats/domain";
import { assertSingleSymbol, partitionBySymbol, sortByDate } from "./grouping.js";
import type { DerivedPricePoint } from "./types.js";

// ============================================
// Parameters
// ============================================

export interface ReturnsParams {
	/** Decimal places kept on the percent return */
	decimals: number;
}

export const RETURNS_DEFAULTS: ReturnsParams = {
	decimals: 2,
};

// ============================================
// Result Types
// ============================================

export interface DailyReturnsResult {
	/** Valid rows with their lag and return, ordered by symbol then date */
	rows: DerivedPricePoint[];
	/** Rows excluded by screening */
	rejected: RowIssue[];
}

// ============================================
// Calculation Functions
// ============================================

/**
 * Calculate daily returns for one symbol's rows.
 *
 * @throws Error if the rows belong to more than one symbol
 */
export function calculateSymbolReturns(
	series: readonly RawPricePoint[],
	params: ReturnsParams = RETURNS_DEFAULTS,
): DailyReturnsResult {
	assertSingleSymbol(series);

	const rows: DerivedPricePoint[] = [];
	const rejected: RowIssue[] = [];
	let previous: PricePoint | null = null;

	for (const raw of sortByDate(series)) {
		let point: PricePoint;
		try {
			point = screenPricePoint(raw);
		} catch (error) {
			if (isRowRejected(error)) {
				rejected.push(error.toRowIssue());
				continue;
			}
			throw error;
		}

		rows.push({
			...point,
			previous_adjusted: previous ? previous.adjusted : null,
			daily_return: previous ? percentChange(point.adjusted, previous.adjusted, params.decimals) : null,
		});
		previous = point;
	}

	return { rows, rejected };
}

/**
 * Calculate daily returns across a whole panel, one symbol at a time.
 */
export function calculateDailyReturns(
	panel: readonly RawPricePoint[],
	params: ReturnsParams = RETURNS_DEFAULTS,
): DailyReturnsResult {
	const rows: DerivedPricePoint[] = [];
	const rejected: RowIssue[] = [];

	for (const series of partitionBySymbol(panel).values()) {
		const result = calculateSymbolReturns(series, params);
		rows.push(...result.rows);
		rejected.push(...result.rejected);
	}

	return { rows, rejected };
}
