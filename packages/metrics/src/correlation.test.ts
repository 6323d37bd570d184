/**
 * Correlation Engine Tests
 */

import type { CorrelationFeature } from "@panelstats/config";
import { screenPricePoint } from "@panelstats/domain";
import { buildSeries, makePricePoint, requireArrayItem } from "@panelstats/test-utils";
import { describe, expect, it } from "vitest";
import {
	buildFeatureTable,
	CORRELATION_DEFAULTS,
	completeCases,
	computeFeatureCorrelation,
	computeSymbolCorrelation,
	pivotReturns,
} from "./correlation.js";
import { calculateSymbolReturns } from "./returns.js";
import type { DerivedPricePoint, FeatureRow } from "./types.js";

/**
 * close and volume move together, daily_return moves against them and
 * rolling_volume never changes. Row 0 has no rolling volatility yet.
 */
function featureRows(): FeatureRow[] {
	return [0, 1, 2, 3, 4, 5].map((i) => ({
		symbol: i % 2 === 0 ? "AAA" : "BBB",
		date: `2021-01-0${i + 4}`,
		close: i,
		daily_return: -i,
		daily_range: i * i,
		volume: 2 * i,
		rolling_volume: 5,
		rolling_volatility: i === 0 ? null : i % 2,
	}));
}

function derived(symbol: string, date: string, dailyReturn: number | null): DerivedPricePoint {
	return {
		...screenPricePoint(makePricePoint({ symbol, date })),
		previous_adjusted: null,
		daily_return: dailyReturn,
	};
}

describe("buildFeatureTable", () => {
	it("derives daily range and joins rolling statistics by symbol and date", () => {
		const { rows } = calculateSymbolReturns(buildSeries([100, 110]));
		const table = buildFeatureTable(rows, [
			{ symbol: "TEST", date: "2021-01-05", rolling_volatility: 1.5, rolling_volume: 900 },
		]);

		expect(table).toEqual([
			{
				symbol: "TEST",
				date: "2021-01-04",
				close: 100,
				daily_return: null,
				daily_range: 2,
				volume: 1000,
				rolling_volume: null,
				rolling_volatility: null,
			},
			{
				symbol: "TEST",
				date: "2021-01-05",
				close: 110,
				daily_return: 10,
				daily_range: 2,
				volume: 1100,
				rolling_volume: 900,
				rolling_volatility: 1.5,
			},
		]);
	});
});

describe("completeCases", () => {
	it("drops every row with a null selected feature", () => {
		const { columns, observations, droppedRows } = completeCases(featureRows(), [
			"close",
			"rolling_volatility",
		]);

		expect(observations).toBe(5);
		expect(droppedRows).toBe(1);
		expect(columns).toEqual([
			[1, 2, 3, 4, 5],
			[1, 0, 1, 0, 1],
		]);
	});

	it("ignores nulls in features that are not selected", () => {
		expect(completeCases(featureRows(), ["close", "volume"]).observations).toBe(6);
	});
});

describe("computeFeatureCorrelation", () => {
	const result = computeFeatureCorrelation(featureRows());
	const { labels, values } = result.matrix;

	it("pools complete cases across symbols", () => {
		expect(result.observations).toBe(5);
		expect(result.droppedRows).toBe(1);
		expect(result.matrix.counts[0]?.[1]).toBe(5);
	});

	it("is symmetric with a unit diagonal", () => {
		expect(labels).toEqual(CORRELATION_DEFAULTS.features);
		labels.forEach((_, i) => {
			expect(values[i]?.[i]).toBe(1);
			labels.forEach((_, j) => {
				expect(values[i]?.[j]).toBe(values[j]?.[i]);
			});
		});
	});

	it("computes Pearson coefficients per pair", () => {
		expect(values[0]?.[1]).toBe(-1);
		expect(values[0]?.[3]).toBe(1);
	});

	it("leaves zero-variance pairs null but keeps their diagonal", () => {
		expect(values[0]?.[4]).toBeNull();
		expect(values[4]?.[0]).toBeNull();
		expect(values[4]?.[4]).toBe(1);
	});

	it("melts row-major into feature pairs only", () => {
		expect(result.long).toHaveLength(36);
		expect(result.long.slice(0, 2)).toEqual([
			{ row_feature: "close", col_feature: "close", value: 1 },
			{ row_feature: "close", col_feature: "daily_return", value: -1 },
		]);
		expect(requireArrayItem(result.long, 6, "cell")).toEqual({
			row_feature: "daily_return",
			col_feature: "close",
			value: -1,
		});

		const features: readonly CorrelationFeature[] = CORRELATION_DEFAULTS.features;
		for (const cell of result.long) {
			expect(features).toContain(cell.row_feature);
			expect(features).toContain(cell.col_feature);
		}
	});

	it("follows the configured feature order", () => {
		const subset = computeFeatureCorrelation(featureRows(), {
			features: ["volume", "close"],
			minObservations: 2,
		});

		expect(subset.matrix.labels).toEqual(["volume", "close"]);
		expect(subset.observations).toBe(6);
		expect(subset.long).toEqual([
			{ row_feature: "volume", col_feature: "volume", value: 1 },
			{ row_feature: "volume", col_feature: "close", value: 1 },
			{ row_feature: "close", col_feature: "volume", value: 1 },
			{ row_feature: "close", col_feature: "close", value: 1 },
		]);
	});

	it("nulls every off-diagonal cell below the observation minimum", () => {
		const sparse = computeFeatureCorrelation(featureRows(), {
			...CORRELATION_DEFAULTS,
			minObservations: 10,
		});

		expect(sparse.matrix.values[0]).toEqual([1, null, null, null, null, null]);
	});

	it("handles an empty table", () => {
		const empty = computeFeatureCorrelation([]);

		expect(empty.observations).toBe(0);
		expect(empty.matrix.values[1]).toEqual([null, 1, null, null, null, null]);
	});
});

describe("symbol correlation", () => {
	const rows = [
		derived("AAA", "2021-01-04", null),
		derived("AAA", "2021-01-05", 1),
		derived("AAA", "2021-01-06", 2),
		derived("AAA", "2021-01-07", 3),
		derived("BBB", "2021-01-04", null),
		derived("BBB", "2021-01-05", 2),
		derived("BBB", "2021-01-06", 4),
		derived("BBB", "2021-01-07", 6),
		derived("CCC", "2021-01-05", 3),
		derived("CCC", "2021-01-06", 2),
		derived("CCC", "2021-01-07", 1),
		derived("DDD", "2021-01-07", 7),
		derived("DDD", "2021-01-08", 8),
	];

	it("pivots returns to dates by symbols", () => {
		const pivot = pivotReturns(rows);

		expect(pivot.symbols).toEqual(["AAA", "BBB", "CCC", "DDD"]);
		expect(pivot.dates).toEqual([
			"2021-01-04",
			"2021-01-05",
			"2021-01-06",
			"2021-01-07",
			"2021-01-08",
		]);
		expect(pivot.values[1]).toEqual([1, 2, 3, null]);
		expect(pivot.values[4]).toEqual([null, null, null, 8]);
	});

	it("correlates each pair over the dates both symbols have", () => {
		const { matrix, long } = computeSymbolCorrelation(rows);

		expect(matrix.values).toEqual([
			[1, 1, -1, null],
			[1, 1, -1, null],
			[-1, -1, 1, null],
			[null, null, null, 1],
		]);
		expect(matrix.counts[0]).toEqual([3, 3, 3, 1]);
		expect(matrix.counts[3]?.[3]).toBe(2);
		expect(requireArrayItem(long, 1, "cell")).toEqual({
			row_symbol: "AAA",
			col_symbol: "BBB",
			value: 1,
		});
	});
});
