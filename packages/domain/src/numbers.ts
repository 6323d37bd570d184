/**
 * Numeric helpers shared by every metric.
 */

/**
 * Round half away from zero to a fixed number of decimals.
 *
 * The relative nudge keeps values such as 1.005 from landing on the
 * wrong side of the midpoint after binary representation error.
 */
export function roundTo(value: number, decimals = 2): number {
	const factor = 10 ** decimals;
	const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor * (1 + Number.EPSILON))) / factor;
	// Collapse -0
	return rounded === 0 ? 0 : rounded;
}

/**
 * Percentage change of `current` over `previous`, rounded.
 *
 * @returns null when the base is not a positive finite number
 */
export function percentChange(current: number, previous: number, decimals = 2): number | null {
	if (!Number.isFinite(current) || !Number.isFinite(previous) || previous <= 0) {
		return null;
	}
	return roundTo((current / previous - 1) * 100, decimals);
}
