/**
 * Metrics Pipeline
 *
 * Orchestrates the batch run over one price panel:
 * Validate → Returns → {Periodic bars, Rolling stats, Yearly summaries} → Correlation
 *
 * Panel-level validation failures abort before anything is computed.
 * Row-level failures only remove the affected row.
 */

import { randomUUID } from "node:crypto";
import { DEFAULT_CONFIG, type PanelstatsConfig } from "@panelstats/config";
import { parsePanel, type RowIssue } from "@panelstats/domain";
import { type Logger, withRunContext } from "@panelstats/logger";
import {
	buildFeatureTable,
	type CorrelationParams,
	computeFeatureCorrelation,
	computeSymbolCorrelation,
} from "./correlation.js";
import { groupBy } from "./grouping.js";
import { log } from "./logger.js";
import { aggregateMonthly, aggregateYearly } from "./periodic.js";
import { calculateDailyReturns, type ReturnsParams } from "./returns.js";
import { calculateRollingStats, type RollingParams } from "./rolling.js";
import { summarizeYearlyVolatility, summarizeYearlyVolume } from "./summaries.js";
import type {
	DerivedPricePoint,
	FeatureCorrelation,
	MonthlyBar,
	RollingStat,
	SymbolCorrelation,
	VolumeSummary,
	YearlyBar,
	YearlyVolatilitySummary,
} from "./types.js";

/**
 * Pipeline run statistics
 */
export interface RunStats {
	runId: string;
	symbolCount: number;
	inputRows: number;
	validRows: number;
	rejectedRows: number;
	processingTimeMs: number;
}

/**
 * Every output table of one run
 */
export interface PanelMetrics {
	daily: DerivedPricePoint[];
	rejected: RowIssue[];
	monthly: MonthlyBar[];
	yearly: YearlyBar[];
	rolling: RollingStat[];
	yearlyVolatility: YearlyVolatilitySummary[];
	yearlyVolume: VolumeSummary[];
	featureCorrelation: FeatureCorrelation;
	/** Present only when correlation.symbol_matrix is enabled */
	symbolCorrelation: SymbolCorrelation | null;
	stats: RunStats;
}

export interface PipelineOptions {
	config?: PanelstatsConfig;
	logger?: Logger;
	/** Defaults to a random UUID */
	runId?: string;
}

export class MetricsPipeline {
	private readonly config: PanelstatsConfig;
	private readonly logger: Logger;

	constructor(options: Omit<PipelineOptions, "runId"> = {}) {
		this.config = options.config ?? DEFAULT_CONFIG;
		this.logger = options.logger ?? log;
	}

	/**
	 * Run every stage over the panel.
	 *
	 * @throws InvalidInputError if the panel fails structural validation
	 */
	run(panel: unknown, runId: string = randomUUID()): PanelMetrics {
		const startTime = performance.now();
		const runLog = withRunContext(this.logger, {
			runId,
			environment: this.config.core.environment,
		});

		const raw = parsePanel(panel);
		runLog.info({ rows: raw.length }, "Panel validated");

		// Stage 1: returns, with row screening
		const returns = calculateDailyReturns(raw, this.returnsParams());
		this.logRejections(runLog, returns.rejected);
		const daily = returns.rows;

		// Stage 2: per-symbol aggregates
		const periodicStart = performance.now();
		const monthly = aggregateMonthly(daily, this.returnsParams());
		const yearly = aggregateYearly(daily, this.returnsParams());
		runLog.debug(
			{ monthly: monthly.length, yearly: yearly.length, ms: performance.now() - periodicStart },
			"Periodic bars aggregated",
		);

		const rollingStart = performance.now();
		const rolling = calculateRollingStats(daily, this.rollingParams("feature"));
		const yearlyVolatility = summarizeYearlyVolatility(daily, this.rollingParams("summary"));
		const yearlyVolume = summarizeYearlyVolume(daily);
		runLog.debug(
			{ rolling: rolling.length, ms: performance.now() - rollingStart },
			"Rolling statistics computed",
		);

		// Stage 3: cross-symbol correlation
		const featureCorrelation = computeFeatureCorrelation(
			buildFeatureTable(daily, rolling),
			this.correlationParams(),
		);
		runLog.debug(
			{
				observations: featureCorrelation.observations,
				droppedRows: featureCorrelation.droppedRows,
			},
			"Feature correlation computed",
		);

		const symbolCorrelation = this.config.correlation.symbol_matrix
			? computeSymbolCorrelation(daily, this.correlationParams())
			: null;

		const stats: RunStats = {
			runId,
			symbolCount: new Set(daily.map((row) => row.symbol)).size,
			inputRows: raw.length,
			validRows: daily.length,
			rejectedRows: returns.rejected.length,
			processingTimeMs: performance.now() - startTime,
		};
		runLog.info(stats, "Metrics run complete");

		return {
			daily,
			rejected: returns.rejected,
			monthly,
			yearly,
			rolling,
			yearlyVolatility,
			yearlyVolume,
			featureCorrelation,
			symbolCorrelation,
			stats,
		};
	}

	private returnsParams(): ReturnsParams {
		return { decimals: this.config.returns.decimals };
	}

	private rollingParams(consumer: "feature" | "summary"): RollingParams {
		const { window, summary_alignment } = this.config.rolling;
		// The RollingStat table and correlation features are always trailing
		return {
			window,
			alignment: consumer === "feature" ? "trailing" : summary_alignment,
		};
	}

	private correlationParams(): CorrelationParams {
		return {
			features: this.config.correlation.features,
			minObservations: this.config.correlation.min_observations,
		};
	}

	private logRejections(runLog: Logger, rejected: RowIssue[]): void {
		for (const [symbol, issues] of groupBy(rejected, (issue) => issue.symbol)) {
			runLog.warn(
				{
					symbol,
					count: issues.length,
					dates: issues.map((issue) => issue.date),
				},
				"Rows rejected",
			);
		}
	}
}

/**
 * Run the pipeline once with the given options.
 */
export function computePanelMetrics(panel: unknown, options: PipelineOptions = {}): PanelMetrics {
	return new MetricsPipeline(options).run(panel, options.runId);
}
