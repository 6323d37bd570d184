/**
 * Analytics Error Tests
 */

import { describe, expect, it } from "vitest";
import {
	AnalyticsError,
	ConfigValidationError,
	InvalidInputError,
	InvalidPriceError,
	InvalidVolumeError,
	isAnalyticsError,
	isRowRejected,
} from "./errors.js";

describe("InvalidInputError", () => {
	it("is fatal and carries its issues", () => {
		const error = new InvalidInputError("Invalid price panel: 1 issue(s)", ["0.adjusted: Required"]);

		expect(error).toBeInstanceOf(AnalyticsError);
		expect(error.name).toBe("InvalidInputError");
		expect(error.code).toBe("INVALID_INPUT");
		expect(error.fatal).toBe(true);
		expect(error.issues).toEqual(["0.adjusted: Required"]);
		expect(error.toJSON().issues).toEqual(["0.adjusted: Required"]);
	});

	it("formats with its code", () => {
		const error = new InvalidInputError("Invalid price panel: 1 issue(s)", []);
		expect(error.toFormattedString()).toBe("[INVALID_INPUT] Invalid price panel: 1 issue(s)");
	});
});

describe("ConfigValidationError", () => {
	it("uses the config code", () => {
		const error = new ConfigValidationError("Invalid configuration", ["rolling.window: Required"]);
		expect(error.code).toBe("INVALID_CONFIG");
		expect(error.fatal).toBe(true);
	});
});

describe("InvalidPriceError", () => {
	it("is row-level and converts to a row issue", () => {
		const error = new InvalidPriceError("AAPL", "2021-03-01", "adjusted", -5);

		expect(error.fatal).toBe(false);
		expect(error.message).toBe("AAPL 2021-03-01: adjusted price is -5");
		expect(error.toFormattedString()).toBe(
			"[INVALID_PRICE] AAPL 2021-03-01: adjusted price is -5 | (row-level)",
		);
		expect(error.toRowIssue()).toEqual({
			symbol: "AAPL",
			date: "2021-03-01",
			code: "INVALID_PRICE",
			field: "adjusted",
			value: -5,
			message: "AAPL 2021-03-01: adjusted price is -5",
		});
	});

	it("describes missing prices", () => {
		const error = new InvalidPriceError("AAPL", "2021-03-01", "close", null);
		expect(error.message).toBe("AAPL 2021-03-01: close price is missing");
	});
});

describe("InvalidVolumeError", () => {
	it("reports the volume field", () => {
		const issue = new InvalidVolumeError("MSFT", "2021-03-02", -10).toRowIssue();
		expect(issue.code).toBe("INVALID_VOLUME");
		expect(issue.field).toBe("volume");
		expect(issue.message).toBe("MSFT 2021-03-02: volume is -10");
	});
});

describe("type guards", () => {
	it("recognise analytics and row errors", () => {
		const rowError = new InvalidPriceError("AAPL", "2021-03-01", "open", 0);
		const panelError = new InvalidInputError("bad", []);

		expect(isAnalyticsError(rowError)).toBe(true);
		expect(isAnalyticsError(new Error("plain"))).toBe(false);
		expect(isRowRejected(rowError)).toBe(true);
		expect(isRowRejected(panelError)).toBe(false);
	});
});
