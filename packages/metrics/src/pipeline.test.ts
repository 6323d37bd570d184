/**
 * Metrics Pipeline Tests
 */

import { validateConfigOrThrow } from "@panelstats/config";
import { InvalidInputError, roundTo } from "@panelstats/domain";
import { createNodeLogger } from "@panelstats/logger";
import { buildSeries, requireArrayItem, requireValue } from "@panelstats/test-utils";
import { describe, expect, it } from "vitest";
import { computePanelMetrics, MetricsPipeline } from "./pipeline.js";

const prices = (offset: number): number[] =>
	Array.from({ length: 12 }, (_, i) => roundTo(50 + offset + 3 * Math.sin(i + offset), 2));

function buildPanel() {
	return [...buildSeries(prices(0), { symbol: "AAA" }), ...buildSeries(prices(7), { symbol: "BBB" })];
}

const config = validateConfigOrThrow({ core: { environment: "test" }, rolling: { window: 5 } });

function captureLogger() {
	const lines: string[] = [];
	const logger = createNodeLogger({
		service: "metrics",
		level: "warn",
		pretty: false,
		destination: {
			write: (msg: string) => {
				lines.push(msg);
			},
		},
	});
	const records = (): Record<string, unknown>[] =>
		lines.map((line): Record<string, unknown> => JSON.parse(line));
	return { logger, records };
}

describe("computePanelMetrics", () => {
	it("produces every table for a clean panel", () => {
		const metrics = computePanelMetrics(buildPanel(), { config, runId: "run-clean" });

		expect(metrics.stats).toMatchObject({
			runId: "run-clean",
			symbolCount: 2,
			inputRows: 24,
			validRows: 24,
			rejectedRows: 0,
		});
		expect(metrics.daily).toHaveLength(24);
		expect(metrics.rolling).toHaveLength(24);
		expect(metrics.rejected).toEqual([]);
		expect(metrics.monthly.map((bar) => [bar.symbol, bar.month])).toEqual([
			["AAA", 1],
			["BBB", 1],
		]);
		expect(metrics.yearly.map((bar) => bar.yearly_return)).toEqual([null, null]);
		expect(metrics.yearlyVolatility.map((summary) => summary.symbol)).toEqual(["AAA", "BBB"]);
		expect(metrics.yearlyVolume).toHaveLength(2);
	});

	it("starts each symbol's return chain at null", () => {
		const { daily } = computePanelMetrics(buildPanel(), { config });

		expect(daily.filter((row) => row.daily_return === null).map((row) => row.symbol)).toEqual([
			"AAA",
			"BBB",
		]);
	});

	it("correlates only rows with every feature present", () => {
		const { featureCorrelation } = computePanelMetrics(buildPanel(), { config });

		// Trailing volatility needs five returns, so each symbol's first five rows drop out
		expect(featureCorrelation.observations).toBe(14);
		expect(featureCorrelation.droppedRows).toBe(10);
		expect(featureCorrelation.long).toHaveLength(36);
		featureCorrelation.matrix.values.forEach((row, i) => {
			expect(row[i]).toBe(1);
		});
	});

	it("computes the symbol matrix only when enabled", () => {
		expect(computePanelMetrics(buildPanel(), { config }).symbolCorrelation).toBeNull();

		const enabled = validateConfigOrThrow({
			core: { environment: "test" },
			rolling: { window: 5 },
			correlation: { symbol_matrix: true },
		});
		const symbolCorrelation = requireValue(
			computePanelMetrics(buildPanel(), { config: enabled }).symbolCorrelation,
			"symbol correlation",
		);

		expect(symbolCorrelation.matrix.labels).toEqual(["AAA", "BBB"]);
		expect(symbolCorrelation.matrix.counts[0]?.[1]).toBe(11);
		expect(symbolCorrelation.long).toHaveLength(4);
	});

	it("drops a rejected row and keeps going", () => {
		const panel = buildPanel().map((row, i) => (i === 3 ? { ...row, volume: -1 } : row));
		const { logger, records } = captureLogger();

		const metrics = computePanelMetrics(panel, { config, logger, runId: "run-rejects" });

		expect(metrics.rejected).toEqual([
			{
				symbol: "AAA",
				date: "2021-01-07",
				code: "INVALID_VOLUME",
				field: "volume",
				value: -1,
				message: "AAA 2021-01-07: volume is -1",
			},
		]);
		expect(metrics.stats.validRows).toBe(23);
		expect(metrics.stats.rejectedRows).toBe(1);
		expect(metrics.daily.filter((row) => row.symbol === "BBB")).toHaveLength(12);

		const warning = requireArrayItem(records(), 0, "warning");
		expect(warning).toMatchObject({
			severity: "WARN",
			msg: "Rows rejected",
			runId: "run-rejects",
			symbol: "AAA",
			count: 1,
			dates: ["2021-01-07"],
		});
	});

	it("rejects a NaN price on one row without losing other symbols", () => {
		const panel = buildPanel().map((row, i) => (i === 1 ? { ...row, adjusted: Number.NaN } : row));

		const metrics = computePanelMetrics(panel, { config });

		expect(metrics.rejected).toEqual([
			{
				symbol: "AAA",
				date: "2021-01-05",
				code: "INVALID_PRICE",
				field: "adjusted",
				value: Number.NaN,
				message: "AAA 2021-01-05: adjusted price is NaN",
			},
		]);
		expect(metrics.daily.filter((row) => row.symbol === "AAA")).toHaveLength(11);
		expect(metrics.daily.filter((row) => row.symbol === "BBB")).toHaveLength(12);
	});

	it("keeps the rolling table trailing whatever the summary alignment", () => {
		const centered = validateConfigOrThrow({
			core: { environment: "test" },
			rolling: { window: 5, summary_alignment: "centered", feature_alignment: "centered" },
		});
		const { rolling } = computePanelMetrics(buildPanel(), { config: centered });

		expect(rolling.slice(0, 5).map((stat) => stat.rolling_volume)).toEqual([
			null,
			null,
			null,
			null,
			1200,
		]);
	});

	it("aborts on duplicate keys before computing anything", () => {
		const panel = buildPanel();
		const duplicate = requireArrayItem(panel, 0, "row");

		expect(() => computePanelMetrics([...panel, duplicate], { config })).toThrow(InvalidInputError);
	});

	it("aborts on input that is not a panel", () => {
		try {
			new MetricsPipeline({ config }).run("not a panel");
			expect.unreachable("expected InvalidInputError");
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidInputError);
			if (error instanceof InvalidInputError) {
				expect(error.fatal).toBe(true);
				expect(error.issues).toEqual(["<root>: Expected array, received string"]);
			}
		}
	});
});
