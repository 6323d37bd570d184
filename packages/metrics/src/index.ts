/**
 * @panelstats/metrics - Performance and Risk Metrics
 *
 * Derives returns, periodic bars, rolling statistics and correlations from
 * a daily price panel.
 */

export const PACKAGE_NAME = "@panelstats/metrics";
export const VERSION = "0.1.0";

// ============================================
// Pipeline
// ============================================

export {
	computePanelMetrics,
	MetricsPipeline,
	type PanelMetrics,
	type PipelineOptions,
	type RunStats,
} from "./pipeline.js";

// ============================================
// Components
// ============================================

export {
	buildFeatureTable,
	CORRELATION_DEFAULTS,
	type CorrelationParams,
	completeCases,
	computeFeatureCorrelation,
	computeSymbolCorrelation,
	meltCorrelationMatrix,
	meltSymbolMatrix,
	pivotReturns,
	type ReturnsPivot,
} from "./correlation.js";
export { groupBy, partitionBySymbol, sortByDate } from "./grouping.js";
export { aggregateMonthly, aggregateYearly } from "./periodic.js";
export {
	calculateDailyReturns,
	calculateSymbolReturns,
	type DailyReturnsResult,
	RETURNS_DEFAULTS,
	type ReturnsParams,
} from "./returns.js";
export {
	calculateRollingStats,
	ROLLING_DEFAULTS,
	type RollingParams,
	rollingApply,
	rollingMean,
	rollingVolatility,
	windowBounds,
} from "./rolling.js";
export { maxOf, mean, pearsonCorrelation, sampleStdDev } from "./statistics.js";
export {
	SUMMARY_ROLLING_DEFAULTS,
	summarizeYearlyVolatility,
	summarizeYearlyVolume,
} from "./summaries.js";

// ============================================
// Types
// ============================================

export type {
	CorrelationCell,
	CorrelationMatrix,
	DerivedPricePoint,
	FeatureCorrelation,
	FeatureRow,
	MonthlyBar,
	RollingStat,
	SymbolCorrelation,
	SymbolCorrelationCell,
	VolumeSummary,
	YearlyBar,
	YearlyVolatilitySummary,
} from "./types.js";
