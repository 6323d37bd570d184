/**
 * Configuration Loader
 *
 * Loads and merges YAML configuration files with environment-specific overrides.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { log } from "./logger.js";
import type { PanelstatsEnvironment } from "./schemas/core.js";
import { type PanelstatsConfig, validateConfigOrThrow } from "./validate.js";

/**
 * Directory holding default.yaml and the environment overrides
 */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../configs", import.meta.url));

// Override lists replace base lists instead of concatenating
const mergeConfig = deepmergeCustom({ mergeArrays: false });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a YAML file
 *
 * An empty file parses to an empty object.
 *
 * @throws Error if the file cannot be read or parsed, or is not a mapping
 */
async function loadYaml(path: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    const content = await readFile(path, "utf-8");
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load YAML from ${path}: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Failed to load YAML from ${path}: top level must be a mapping`);
  }
  return parsed;
}

/**
 * Load configuration with environment-specific overrides
 *
 * Loads base configuration from default.yaml, then merges with
 * `<environment>.yaml` when it exists.
 *
 * @throws ConfigValidationError if the merged configuration is invalid
 */
export async function loadConfig(
  environment: PanelstatsEnvironment,
  configDir = DEFAULT_CONFIG_DIR
): Promise<PanelstatsConfig> {
  const base = await loadYaml(`${configDir}/default.yaml`);

  let override: Record<string, unknown> = {};
  try {
    override = await loadYaml(`${configDir}/${environment}.yaml`);
  } catch (error) {
    // Environment override is optional
    log.warn(
      { environment, configDir, error: error instanceof Error ? error.message : String(error) },
      `No usable ${environment}.yaml found, using defaults only`
    );
  }

  // The requested environment wins over whatever the files say
  return validateConfigOrThrow(mergeConfig(base, override, { core: { environment } }));
}

/**
 * Load configuration from a specific file
 */
export async function loadConfigFromFile(path: string): Promise<PanelstatsConfig> {
  const content = await loadYaml(path);
  return validateConfigOrThrow(content);
}

/**
 * Resolve the environment from PANELSTATS_ENV, then NODE_ENV
 */
export function resolveEnvironment(
  env: Record<string, string | undefined> = process.env
): PanelstatsEnvironment {
  const explicit = env.PANELSTATS_ENV;
  if (explicit === "development" || explicit === "production" || explicit === "test") {
    return explicit;
  }
  if (env.NODE_ENV === "production") {
    return "production";
  }
  if (env.NODE_ENV === "test") {
    return "test";
  }
  return "development";
}

/**
 * Load configuration for the environment named by the process environment
 */
export async function loadConfigWithEnv(configDir = DEFAULT_CONFIG_DIR): Promise<PanelstatsConfig> {
  return loadConfig(resolveEnvironment(), configDir);
}
