/**
 * @panelstats/domain - Price panel contract and error taxonomy
 *
 * This package contains:
 * - Zod schemas for the daily price panel
 * - Panel and row validation
 * - Typed analytics errors
 * - Trading date and rounding helpers
 */

export const PACKAGE_NAME = "@panelstats/domain";
export const VERSION = "0.1.0";

export {
	compareTradingDates,
	isTradingDate,
	parseTradingDate,
	tradingMonth,
	tradingYear,
} from "./dates.js";
export {
	AnalyticsError,
	type AnalyticsErrorCode,
	ConfigValidationError,
	InvalidInputError,
	InvalidPriceError,
	InvalidVolumeError,
	isAnalyticsError,
	isRowRejected,
	type PriceField,
	type RowIssue,
	type RowIssueCode,
	RowRejectedError,
} from "./errors.js";
export { percentChange, roundTo } from "./numbers.js";
export {
	PricePanelSchema,
	type PricePoint,
	parsePanel,
	type RawPricePoint,
	RawPricePointSchema,
	screenPricePoint,
	TradingDateSchema,
} from "./panel.js";
