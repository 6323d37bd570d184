/**
 * Metrics Configuration Schema
 *
 * Defines how returns, rolling windows and correlations are computed.
 */

import { z } from "zod";

// ============================================
// Returns
// ============================================

export const ReturnsConfigSchema = z.object({
  /**
   * Decimal places kept on percentage returns
   *
   * Applies to daily, monthly and yearly returns.
   */
  decimals: z.number().int().min(0).max(8).default(2),
});
export type ReturnsConfig = z.infer<typeof ReturnsConfigSchema>;

// ============================================
// Rolling Windows
// ============================================

/**
 * Where a windowed statistic is attributed
 *
 * - trailing: window ends at the row (right-aligned)
 * - centered: row sits in the middle; positions near either end of a series
 *   have no value
 */
export const RollingAlignment = z.enum(["trailing", "centered"]);
export type RollingAlignment = z.infer<typeof RollingAlignment>;

export const RollingConfigSchema = z.object({
  /**
   * Observations per window
   */
  window: z.number().int().min(2).default(30),

  /**
   * Alignment of the volatility series behind the yearly summary
   */
  summary_alignment: RollingAlignment.default("centered"),
});
export type RollingConfig = z.infer<typeof RollingConfigSchema>;

// ============================================
// Correlation
// ============================================

/**
 * Enumerated feature schema for the pooled correlation matrix
 */
export const CorrelationFeature = z.enum([
  "close",
  "daily_return",
  "daily_range",
  "volume",
  "rolling_volume",
  "rolling_volatility",
]);
export type CorrelationFeature = z.infer<typeof CorrelationFeature>;

export const CorrelationConfigSchema = z.object({
  /**
   * Features correlated, in matrix order
   */
  features: z
    .array(CorrelationFeature)
    .min(2)
    .refine((features) => new Set(features).size === features.length, {
      message: "Features must not repeat",
    })
    .default([...CorrelationFeature.options]),

  /**
   * Fewest complete-case rows (or shared dates) a coefficient needs
   */
  min_observations: z.number().int().min(2).default(2),

  /**
   * Also compute the symbol-vs-symbol matrix of daily returns
   */
  symbol_matrix: z.boolean().default(false),
});
export type CorrelationConfig = z.infer<typeof CorrelationConfigSchema>;
