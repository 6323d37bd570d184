/**
 * Correlation Engine
 *
 * Two distinct matrices, answering different questions:
 *
 * - Feature correlation: pools one row per (symbol, date) across every
 *   symbol, keeps complete cases only, and correlates derived features
 *   against each other (e.g. volume vs. volatility).
 * - Symbol correlation: pivots daily returns to dates x symbols and
 *   correlates symbols against each other, each pair over the dates both
 *   symbols traded.
 */

import type { CorrelationFeature } from "@panelstats/config";
import { pearsonCorrelation } from "./statistics.js";
import type {
	CorrelationCell,
	CorrelationMatrix,
	DerivedPricePoint,
	FeatureCorrelation,
	FeatureRow,
	RollingStat,
	SymbolCorrelation,
	SymbolCorrelationCell,
} from "./types.js";

export interface CorrelationParams {
	/** Features correlated, in matrix order */
	features: CorrelationFeature[];
	/** Fewest observations a coefficient needs; fewer yields null */
	minObservations: number;
}

export const CORRELATION_DEFAULTS: CorrelationParams = {
	features: ["close", "daily_return", "daily_range", "volume", "rolling_volume", "rolling_volatility"],
	minObservations: 2,
};

const rowKey = (symbol: string, date: string): string => `${symbol}\u0000${date}`;

// ============================================
// Feature Table
// ============================================

/**
 * Join daily rows with their rolling statistics into the pooled feature table.
 *
 * `stats` must come from trailing windows; a row without a matching
 * statistic gets null rolling features.
 */
export function buildFeatureTable(
	rows: readonly DerivedPricePoint[],
	stats: readonly RollingStat[],
): FeatureRow[] {
	const statsByKey = new Map<string, RollingStat>();
	for (const stat of stats) {
		statsByKey.set(rowKey(stat.symbol, stat.date), stat);
	}

	return rows.map((row) => {
		const stat = statsByKey.get(rowKey(row.symbol, row.date));
		return {
			symbol: row.symbol,
			date: row.date,
			close: row.close,
			daily_return: row.daily_return,
			daily_range: row.high - row.low,
			volume: row.volume,
			rolling_volume: stat?.rolling_volume ?? null,
			rolling_volatility: stat?.rolling_volatility ?? null,
		};
	});
}

/**
 * Strict complete-case filter: a row with any null selected feature is
 * dropped entirely.
 *
 * @returns one column of values per feature, in feature order
 */
export function completeCases(
	rows: readonly FeatureRow[],
	features: readonly CorrelationFeature[],
): { columns: number[][]; observations: number; droppedRows: number } {
	const columns: number[][] = features.map(() => []);
	let observations = 0;

	for (const row of rows) {
		const values: number[] = [];
		for (const feature of features) {
			const value = row[feature];
			if (value === null) {
				break;
			}
			values.push(value);
		}
		if (values.length !== features.length) {
			continue;
		}

		values.forEach((value, index) => {
			columns[index]?.push(value);
		});
		observations += 1;
	}

	return { columns, observations, droppedRows: rows.length - observations };
}

// ============================================
// Matrices
// ============================================

function squareMatrix<T>(size: number, fill: (i: number, j: number) => T): T[][] {
	return Array.from({ length: size }, (_, i) => Array.from({ length: size }, (_, j) => fill(i, j)));
}

/**
 * Fill a symmetric matrix from a pairwise function evaluated once per
 * unordered pair. The diagonal is fixed at 1.
 */
function buildMatrix<L extends string>(
	labels: L[],
	pair: (i: number, j: number) => { value: number | null; count: number },
	diagonalCount: (i: number) => number,
): CorrelationMatrix<L> {
	const size = labels.length;
	const values = squareMatrix<number | null>(size, () => null);
	const counts = squareMatrix(size, () => 0);

	for (let i = 0; i < size; i++) {
		const valueRow = values[i];
		const countRow = counts[i];
		if (!valueRow || !countRow) {
			continue;
		}
		valueRow[i] = 1.0;
		countRow[i] = diagonalCount(i);

		for (let j = i + 1; j < size; j++) {
			const { value, count } = pair(i, j);
			valueRow[j] = value;
			countRow[j] = count;

			const mirrorValues = values[j];
			const mirrorCounts = counts[j];
			if (mirrorValues && mirrorCounts) {
				mirrorValues[i] = value;
				mirrorCounts[i] = count;
			}
		}
	}

	return { labels, values, counts };
}

/**
 * Unpivot a matrix to one entry per (row, column) pair, row-major.
 */
function melt<L extends string, C>(
	matrix: CorrelationMatrix<L>,
	cell: (row: L, col: L, value: number | null) => C,
): C[] {
	const cells: C[] = [];
	matrix.labels.forEach((row, i) => {
		matrix.labels.forEach((col, j) => {
			cells.push(cell(row, col, matrix.values[i]?.[j] ?? null));
		});
	});
	return cells;
}

export function meltCorrelationMatrix(
	matrix: CorrelationMatrix<CorrelationFeature>,
): CorrelationCell[] {
	return melt(matrix, (row_feature, col_feature, value) => ({ row_feature, col_feature, value }));
}

export function meltSymbolMatrix(matrix: CorrelationMatrix): SymbolCorrelationCell[] {
	return melt(matrix, (row_symbol, col_symbol, value) => ({ row_symbol, col_symbol, value }));
}

// ============================================
// Feature Correlation
// ============================================

/**
 * Pearson correlation between features over the pooled complete-case rows
 * of all symbols.
 */
export function computeFeatureCorrelation(
	rows: readonly FeatureRow[],
	params: CorrelationParams = CORRELATION_DEFAULTS,
): FeatureCorrelation {
	const features = [...params.features];
	const { columns, observations, droppedRows } = completeCases(rows, features);

	const matrix = buildMatrix(
		features,
		(i, j) => {
			const x = columns[i] ?? [];
			const y = columns[j] ?? [];
			const value = observations >= params.minObservations ? pearsonCorrelation(x, y) : null;
			return { value, count: observations };
		},
		() => observations,
	);

	return {
		matrix,
		long: meltCorrelationMatrix(matrix),
		observations,
		droppedRows,
	};
}

// ============================================
// Symbol Correlation
// ============================================

export interface ReturnsPivot {
	dates: string[];
	symbols: string[];
	/** values[d][s]: return of symbols[s] on dates[d], null when absent */
	values: (number | null)[][];
}

/**
 * Pivot daily returns to a dates x symbols grid, both axes ascending.
 */
export function pivotReturns(rows: readonly DerivedPricePoint[]): ReturnsPivot {
	const dates = [...new Set(rows.map((row) => row.date))].sort();
	const symbols = [...new Set(rows.map((row) => row.symbol))].sort();
	const dateIndex = new Map(dates.map((date, index) => [date, index]));
	const symbolIndex = new Map(symbols.map((symbol, index) => [symbol, index]));

	const values: (number | null)[][] = dates.map(() => symbols.map(() => null));
	for (const row of rows) {
		const d = dateIndex.get(row.date);
		const s = symbolIndex.get(row.symbol);
		const target = d === undefined ? undefined : values[d];
		if (target && s !== undefined) {
			target[s] = row.daily_return;
		}
	}

	return { dates, symbols, values };
}

/**
 * Pearson correlation of daily returns between symbols. Each pair uses the
 * dates on which both symbols have a return.
 */
export function computeSymbolCorrelation(
	rows: readonly DerivedPricePoint[],
	params: Pick<CorrelationParams, "minObservations"> = CORRELATION_DEFAULTS,
): SymbolCorrelation {
	const pivot = pivotReturns(rows);

	const column = (s: number): (number | null)[] => pivot.values.map((dateRow) => dateRow[s] ?? null);
	const columns = pivot.symbols.map((_, s) => column(s));

	const matrix = buildMatrix(
		pivot.symbols,
		(i, j) => {
			const x: number[] = [];
			const y: number[] = [];
			const left = columns[i] ?? [];
			const right = columns[j] ?? [];
			left.forEach((value, d) => {
				const other = right[d];
				if (value !== null && other !== null && other !== undefined) {
					x.push(value);
					y.push(other);
				}
			});
			const value = x.length >= params.minObservations ? pearsonCorrelation(x, y) : null;
			return { value, count: x.length };
		},
		(i) => (columns[i] ?? []).filter((value) => value !== null).length,
	);

	return { matrix, long: meltSymbolMatrix(matrix) };
}
