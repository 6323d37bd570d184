/**
 * Price Panel Contract
 *
 * Zod schemas for the daily (symbol, date) panel handed over by the loader,
 * plus the two validation layers applied to it:
 *
 * - `parsePanel`: structural checks. Any failure throws InvalidInputError and
 *   nothing is computed.
 * - `screenPricePoint`: per-row value checks. A failure rejects that row only.
 */

import { z } from "zod";
import { isTradingDate } from "./dates.js";
import { InvalidInputError, InvalidPriceError, InvalidVolumeError } from "./errors.js";

// ============================================
// Schemas
// ============================================

export const TradingDateSchema = z
	.string()
	.refine(isTradingDate, { message: "Expected a calendar date formatted YYYY-MM-DD" });

/**
 * Numeric columns must be present. Null and NaN pass here and are rejected
 * per row by `screenPricePoint`.
 */
const NumericColumn = z
	.union([z.number(), z.nan()], {
		errorMap: (_issue, ctx) => ({
			message: ctx.data === undefined ? "Required" : `Expected number, received ${typeof ctx.data}`,
		}),
	})
	.nullable();

export const RawPricePointSchema = z.object({
	symbol: z.string().min(1, "Symbol must not be empty"),
	date: TradingDateSchema,
	open: NumericColumn,
	high: NumericColumn,
	low: NumericColumn,
	close: NumericColumn,
	adjusted: NumericColumn,
	volume: NumericColumn,
});
export type RawPricePoint = z.infer<typeof RawPricePointSchema>;

export const PricePanelSchema = z.array(RawPricePointSchema);

/**
 * A row that passed every value check.
 */
export interface PricePoint {
	readonly symbol: string;
	readonly date: string;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly adjusted: number;
	readonly volume: number;
}

// ============================================
// Panel Validation
// ============================================

const formatIssues = (issues: z.ZodIssue[]): string[] => {
	return issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
		return `${path}: ${issue.message}`;
	});
};

const panelKey = (symbol: string, date: string): string => `${symbol}\u0000${date}`;

/**
 * Validate the panel structure and key uniqueness.
 *
 * @throws InvalidInputError listing every structural problem
 */
export function parsePanel(input: unknown): RawPricePoint[] {
	const result = PricePanelSchema.safeParse(input);

	if (!result.success) {
		const issues = formatIssues(result.error.issues);
		throw new InvalidInputError(`Invalid price panel: ${issues.length} issue(s)`, issues);
	}

	const firstSeen = new Map<string, number>();
	const duplicates: string[] = [];

	result.data.forEach((row, index) => {
		const key = panelKey(row.symbol, row.date);
		const previous = firstSeen.get(key);
		if (previous === undefined) {
			firstSeen.set(key, index);
		} else {
			duplicates.push(
				`${index}: duplicate key (${row.symbol}, ${row.date}), first seen at row ${previous}`,
			);
		}
	});

	if (duplicates.length > 0) {
		throw new InvalidInputError(
			`Invalid price panel: ${duplicates.length} duplicate (symbol, date) key(s)`,
			duplicates,
		);
	}

	return result.data;
}

// ============================================
// Row Screening
// ============================================

const isValidPrice = (value: number | null): value is number =>
	value !== null && Number.isFinite(value) && value > 0;

/**
 * Check one row's values.
 *
 * @throws InvalidPriceError for the first price field that is missing or not positive
 * @throws InvalidVolumeError when volume is missing, negative or fractional
 */
export function screenPricePoint(row: RawPricePoint): PricePoint {
	const { symbol, date, open, high, low, close, adjusted, volume } = row;

	// adjusted first: it drives the return chain
	if (!isValidPrice(adjusted)) {
		throw new InvalidPriceError(symbol, date, "adjusted", adjusted);
	}
	if (!isValidPrice(open)) {
		throw new InvalidPriceError(symbol, date, "open", open);
	}
	if (!isValidPrice(high)) {
		throw new InvalidPriceError(symbol, date, "high", high);
	}
	if (!isValidPrice(low)) {
		throw new InvalidPriceError(symbol, date, "low", low);
	}
	if (!isValidPrice(close)) {
		throw new InvalidPriceError(symbol, date, "close", close);
	}
	if (volume === null || !Number.isInteger(volume) || volume < 0) {
		throw new InvalidVolumeError(symbol, date, volume);
	}

	return { symbol, date, open, high, low, close, adjusted, volume };
}
