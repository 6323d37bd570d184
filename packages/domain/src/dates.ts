/**
 * Trading Date Helpers
 *
 * Panel dates are ISO calendar dates (`YYYY-MM-DD`). They sort
 * lexicographically, so ordering never needs a Date object.
 */

import { format, getMonth, getYear, isValid, parseISO } from "date-fns";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function parseTradingDate(value: string): Date | null {
	if (!ISO_DATE_PATTERN.test(value)) {
		return null;
	}
	const parsed = parseISO(value);
	if (!isValid(parsed)) {
		return null;
	}
	// Must round-trip exactly
	return format(parsed, "yyyy-MM-dd") === value ? parsed : null;
}

export function isTradingDate(value: string): boolean {
	return parseTradingDate(value) !== null;
}

export function compareTradingDates(a: string, b: string): number {
	if (a < b) {
		return -1;
	}
	return a > b ? 1 : 0;
}

export function tradingYear(date: string): number {
	return getYear(parseISO(date));
}

/**
 * Calendar month, 1-12.
 */
export function tradingMonth(date: string): number {
	return getMonth(parseISO(date)) + 1;
}
