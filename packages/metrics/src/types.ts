/**
 * Output table types for the metrics pipeline.
 *
 * Column names follow the tables handed to reporting, hence snake_case.
 */

import type { CorrelationFeature } from "@panelstats/config";
import type { PricePoint } from "@panelstats/domain";

// ============================================
// Daily Grain
// ============================================

export interface DerivedPricePoint extends PricePoint {
	/** Adjusted close of the previous valid row of the same symbol */
	previous_adjusted: number | null;
	/** Percent change of adjusted close, null on a symbol's first row */
	daily_return: number | null;
}

export interface RollingStat {
	symbol: string;
	date: string;
	/** Sample standard deviation of daily_return over the window */
	rolling_volatility: number | null;
	/** Mean volume over the window */
	rolling_volume: number | null;
}

// ============================================
// Periodic Bars
// ============================================

export interface MonthlyBar {
	symbol: string;
	year: number;
	/** 1-12 */
	month: number;
	monthly_open: number;
	monthly_close: number;
	monthly_return: number | null;
}

export interface YearlyBar {
	symbol: string;
	year: number;
	yearly_open: number;
	yearly_close: number;
	previous_close: number | null;
	yearly_return: number | null;
}

// ============================================
// Yearly Summaries
// ============================================

export interface YearlyVolatilitySummary {
	symbol: string;
	year: number;
	avg_volatility: number | null;
	max_volatility: number | null;
}

export interface VolumeSummary {
	symbol: string;
	year: number;
	avg_volume: number;
	max_volume: number;
}

// ============================================
// Correlation
// ============================================

/**
 * Square correlation matrix. `values[i][j]` is null when the pair is
 * degenerate; the diagonal is always 1.
 */
export interface CorrelationMatrix<L extends string = string> {
	labels: L[];
	values: (number | null)[][];
	/** Observations behind each cell */
	counts: number[][];
}

export interface CorrelationCell {
	row_feature: CorrelationFeature;
	col_feature: CorrelationFeature;
	value: number | null;
}

export interface SymbolCorrelationCell {
	row_symbol: string;
	col_symbol: string;
	value: number | null;
}

/**
 * One pooled (symbol, date) row of correlation features.
 */
export type FeatureRow = {
	symbol: string;
	date: string;
} & Record<CorrelationFeature, number | null>;

export interface FeatureCorrelation {
	matrix: CorrelationMatrix<CorrelationFeature>;
	long: CorrelationCell[];
	/** Rows that survived the complete-case filter */
	observations: number;
	/** Rows dropped for having a null feature */
	droppedRows: number;
}

export interface SymbolCorrelation {
	matrix: CorrelationMatrix;
	long: SymbolCorrelationCell[];
}
