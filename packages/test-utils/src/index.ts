/**
 * Shared test helpers: value assertions and deterministic panel fixtures.
 */

import type { RawPricePoint } from "@panelstats/domain";
import { addDays, format, isWeekend, parseISO } from "date-fns";

export function requireValue<T>(value: T | null | undefined, label = "value"): T {
	if (value == null) {
		throw new Error(`Expected ${label} to be defined`);
	}
	return value;
}

export function requireArrayItem<T>(items: readonly T[], index: number, label = "item"): T {
	const value = items[index];
	if (value === undefined) {
		throw new Error(`Expected ${label} at index ${index}`);
	}
	return value;
}

// ============================================================
// Panel Fixtures
// ============================================================

/**
 * Build one panel row. Every price defaults to the adjusted close so tests
 * only spell out the fields they care about.
 */
export function makePricePoint(overrides: Partial<RawPricePoint> = {}): RawPricePoint {
	const adjusted = overrides.adjusted === undefined ? 100 : overrides.adjusted;
	const base = adjusted ?? 100;
	return {
		symbol: overrides.symbol ?? "TEST",
		date: overrides.date ?? "2021-01-04",
		open: overrides.open === undefined ? base : overrides.open,
		high: overrides.high === undefined ? base : overrides.high,
		low: overrides.low === undefined ? base : overrides.low,
		close: overrides.close === undefined ? base : overrides.close,
		adjusted,
		volume: overrides.volume === undefined ? 1_000 : overrides.volume,
	};
}

/**
 * `count` consecutive weekdays starting at `start` (which is included when
 * it is itself a weekday).
 */
export function tradingDates(start: string, count: number): string[] {
	const dates: string[] = [];
	let day = parseISO(start);
	while (dates.length < count) {
		if (!isWeekend(day)) {
			dates.push(format(day, "yyyy-MM-dd"));
		}
		day = addDays(day, 1);
	}
	return dates;
}

export interface SeriesOptions {
	symbol?: string;
	start?: string;
	volumes?: number[];
}

/**
 * One symbol's rows, one weekday apart, with the given adjusted closes.
 * Volumes default to 1000, 1100, 1200, ...
 */
export function buildSeries(adjusted: number[], options: SeriesOptions = {}): RawPricePoint[] {
	const { symbol = "TEST", start = "2021-01-04", volumes } = options;
	const dates = tradingDates(start, adjusted.length);

	return adjusted.map((price, index) =>
		makePricePoint({
			symbol,
			date: requireArrayItem(dates, index, "date"),
			adjusted: price,
			high: price + 1,
			low: price - 1,
			volume: volumes?.[index] ?? 1_000 + index * 100,
		}),
	);
}
