/**
 * @panelstats/config - Configuration schemas and loaders
 *
 * This package contains:
 * - Zod schemas for all configuration sections
 * - Configuration loading and merging logic
 * - Validation utilities
 */

export const PACKAGE_NAME = "@panelstats/config";
export const VERSION = "0.1.0";

export {
  DEFAULT_CONFIG_DIR,
  loadConfig,
  loadConfigFromFile,
  loadConfigWithEnv,
  resolveEnvironment,
} from "./loader.js";
export * from "./schemas/index.js";
export {
  DEFAULT_CONFIG,
  type PanelstatsConfig,
  type PanelstatsConfigInput,
  PanelstatsConfigSchema,
  type ValidationResult,
  validateConfig,
  validateConfigOrThrow,
} from "./validate.js";
