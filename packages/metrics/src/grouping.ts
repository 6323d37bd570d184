/**
 * Partitioning helpers.
 *
 * Every lag and window is computed on one symbol's date-ordered series;
 * nothing here ever sorts across symbols and then lags.
 */

import { compareTradingDates } from "@panelstats/domain";

interface Keyed {
	symbol: string;
	date: string;
}

export function groupBy<T, K>(rows: readonly T[], keyOf: (row: T) => K): Map<K, T[]> {
	const groups = new Map<K, T[]>();
	for (const row of rows) {
		const key = keyOf(row);
		const group = groups.get(key);
		if (group) {
			group.push(row);
		} else {
			groups.set(key, [row]);
		}
	}
	return groups;
}

export function sortByDate<T extends Keyed>(rows: readonly T[]): T[] {
	return [...rows].sort((a, b) => compareTradingDates(a.date, b.date));
}

/**
 * Split rows into per-symbol series, symbols in ascending order and each
 * series in ascending date order.
 */
export function partitionBySymbol<T extends Keyed>(rows: readonly T[]): Map<string, T[]> {
	const groups = groupBy(rows, (row) => row.symbol);
	const symbols = [...groups.keys()].sort();

	const partitions = new Map<string, T[]>();
	for (const symbol of symbols) {
		partitions.set(symbol, sortByDate(groups.get(symbol) ?? []));
	}
	return partitions;
}

/**
 * @throws Error when the series mixes symbols
 */
export function assertSingleSymbol(rows: readonly Keyed[]): string | null {
	const first = rows[0];
	if (!first) {
		return null;
	}
	const other = rows.find((row) => row.symbol !== first.symbol);
	if (other) {
		throw new Error(`Expected one symbol per series, got ${first.symbol} and ${other.symbol}`);
	}
	return first.symbol;
}
