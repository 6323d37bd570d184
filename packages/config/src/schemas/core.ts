/**
 * Core Configuration Schema
 *
 * Settings every run needs regardless of which metrics are enabled.
 */

import { z } from "zod";

// ============================================
// Enums
// ============================================

/**
 * Deployment environment, bound on every log line of a run
 */
export const PanelstatsEnvironment = z.enum(["development", "production", "test"]);
export type PanelstatsEnvironment = z.infer<typeof PanelstatsEnvironment>;

// ============================================
// Complete Core Configuration
// ============================================

export const CoreConfigSchema = z.object({
  environment: PanelstatsEnvironment,
});
export type CoreConfig = z.infer<typeof CoreConfigSchema>;
