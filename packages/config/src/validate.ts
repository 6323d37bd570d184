/**
 * Configuration Validation
 *
 * Complete configuration schema and validation logic.
 */

import { ConfigValidationError } from "@panelstats/domain";
import { z } from "zod";
import { CoreConfigSchema } from "./schemas/core.js";
import {
  CorrelationConfigSchema,
  ReturnsConfigSchema,
  RollingConfigSchema,
} from "./schemas/metrics.js";

// ============================================
// Complete Configuration Schema
// ============================================

export const PanelstatsConfigSchema = z.object({
  /**
   * Core settings (environment)
   */
  core: CoreConfigSchema,

  /**
   * Return rounding
   */
  returns: ReturnsConfigSchema.default({}),

  /**
   * Rolling window width and alignment per consumer
   */
  rolling: RollingConfigSchema.default({}),

  /**
   * Feature and symbol correlation
   */
  correlation: CorrelationConfigSchema.default({}),
});
export type PanelstatsConfig = z.infer<typeof PanelstatsConfigSchema>;
export type PanelstatsConfigInput = z.input<typeof PanelstatsConfigSchema>;

/**
 * Configuration with every default applied
 */
export const DEFAULT_CONFIG: PanelstatsConfig = PanelstatsConfigSchema.parse({
  core: { environment: "development" },
});

// ============================================
// Validation Functions
// ============================================

/**
 * Validation result with detailed errors
 */
export interface ValidationResult {
  success: boolean;
  data?: PanelstatsConfig;
  errors: string[];
}

const formatIssues = (issues: z.ZodIssue[]): string[] =>
  issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);

/**
 * Validate configuration object
 *
 * @param config - Raw configuration object to validate
 * @returns Validation result with parsed data or errors
 */
export function validateConfig(config: unknown): ValidationResult {
  const result = PanelstatsConfigSchema.safeParse(config);

  if (result.success) {
    return {
      success: true,
      data: result.data,
      errors: [],
    };
  }

  return {
    success: false,
    errors: formatIssues(result.error.issues),
  };
}

/**
 * Validate configuration and throw on error
 *
 * @throws ConfigValidationError listing every issue
 */
export function validateConfigOrThrow(config: unknown): PanelstatsConfig {
  const result = PanelstatsConfigSchema.safeParse(config);
  if (!result.success) {
    const errors = formatIssues(result.error.issues);
    throw new ConfigValidationError(`Invalid configuration: ${errors.join("; ")}`, errors);
  }
  return result.data;
}
