/**
 * Analytics Error Classes
 *
 * Typed errors raised while validating a price panel or its configuration.
 *
 * | Code            | Error Class          | Scope | Effect                      |
 * |-----------------|----------------------|-------|-----------------------------|
 * | INVALID_INPUT   | InvalidInputError    | Panel | Run aborts before computing |
 * | INVALID_CONFIG  | ConfigValidationError| Run   | Run aborts before computing |
 * | INVALID_PRICE   | InvalidPriceError    | Row   | Row excluded, run continues |
 * | INVALID_VOLUME  | InvalidVolumeError   | Row   | Row excluded, run continues |
 *
 * Insufficient history and degenerate statistics are not errors: they
 * surface as null metrics.
 */

// ============================================
// Error Codes
// ============================================

export type AnalyticsErrorCode =
	| "INVALID_INPUT"
	| "INVALID_CONFIG"
	| "INVALID_PRICE"
	| "INVALID_VOLUME";

export type PriceField = "open" | "high" | "low" | "close" | "adjusted";

export type RowIssueCode = "INVALID_PRICE" | "INVALID_VOLUME";

/**
 * A row excluded from computation, as reported back to the caller.
 */
export interface RowIssue {
	symbol: string;
	date: string;
	code: RowIssueCode;
	field: PriceField | "volume";
	value: number | null;
	message: string;
}

// ============================================
// Base Error Class
// ============================================

export class AnalyticsError extends Error {
	readonly code: AnalyticsErrorCode;

	/** Whether the error aborts the whole run */
	readonly fatal: boolean;

	constructor(
		message: string,
		code: AnalyticsErrorCode,
		options: {
			fatal?: boolean;
			cause?: Error;
		} = {},
	) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.code = code;
		this.fatal = options.fatal ?? true;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	toFormattedString(): string {
		const parts = [`[${this.code}] ${this.message}`, this.fatal ? null : "(row-level)"].filter(
			Boolean,
		);

		return parts.join(" | ");
	}

	/**
	 * Convert to JSON for logging
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			fatal: this.fatal,
			stack: this.stack,
		};
	}
}

// ============================================
// Panel-Level Errors
// ============================================

/**
 * The panel cannot be processed at all: a column is missing or mistyped,
 * a date does not parse, or a (symbol, date) key repeats.
 */
export class InvalidInputError extends AnalyticsError {
	/** One `path: message` entry per problem found */
	readonly issues: string[];

	constructor(message: string, issues: string[], options: { cause?: Error } = {}) {
		super(message, "INVALID_INPUT", { fatal: true, ...options });
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), issues: this.issues };
	}
}

/**
 * The configuration failed schema validation after merging.
 */
export class ConfigValidationError extends AnalyticsError {
	readonly issues: string[];

	constructor(message: string, issues: string[], options: { cause?: Error } = {}) {
		super(message, "INVALID_CONFIG", { fatal: true, ...options });
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), issues: this.issues };
	}
}

// ============================================
// Row-Level Errors
// ============================================

export abstract class RowRejectedError extends AnalyticsError {
	readonly symbol: string;
	readonly date: string;
	readonly field: PriceField | "volume";
	readonly value: number | null;
	readonly issueCode: RowIssueCode;

	protected constructor(
		message: string,
		code: RowIssueCode,
		row: { symbol: string; date: string; field: PriceField | "volume"; value: number | null },
	) {
		super(message, code, { fatal: false });
		this.issueCode = code;
		this.symbol = row.symbol;
		this.date = row.date;
		this.field = row.field;
		this.value = row.value;
	}

	toRowIssue(): RowIssue {
		return {
			symbol: this.symbol,
			date: this.date,
			code: this.issueCode,
			field: this.field,
			value: this.value,
			message: this.message,
		};
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			symbol: this.symbol,
			date: this.date,
			field: this.field,
			value: this.value,
		};
	}
}

/**
 * A price field is missing, non-finite or not strictly positive.
 */
export class InvalidPriceError extends RowRejectedError {
	constructor(symbol: string, date: string, field: PriceField, value: number | null) {
		const shown = value === null ? "missing" : String(value);
		super(`${symbol} ${date}: ${field} price is ${shown}`, "INVALID_PRICE", {
			symbol,
			date,
			field,
			value,
		});
	}
}

/**
 * Volume is missing, negative or fractional.
 */
export class InvalidVolumeError extends RowRejectedError {
	constructor(symbol: string, date: string, value: number | null) {
		const shown = value === null ? "missing" : String(value);
		super(`${symbol} ${date}: volume is ${shown}`, "INVALID_VOLUME", {
			symbol,
			date,
			field: "volume",
			value,
		});
	}
}

// ============================================
// Type Guards
// ============================================

export function isAnalyticsError(error: unknown): error is AnalyticsError {
	return error instanceof AnalyticsError;
}

export function isRowRejected(error: unknown): error is RowRejectedError {
	return error instanceof RowRejectedError;
}
