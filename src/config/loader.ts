/**
 * Configuration loader for guarded-suite
 *
 * Priority, highest first:
 * 1. Environment variables (SUITE_*)
 * 2. Config file (explicit path, or <cwd>/suite.config.json)
 * 3. Built-in defaults
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import { ConfigError, toError } from "../utils/errors.js";
import { readEnvOverrides } from "./env.js";
import {
  HarnessConfigOverridesSchema,
  HarnessConfigSchema,
  createDefaultConfig,
  type HarnessConfig,
  type HarnessConfigOverrides,
} from "./schema.js";

export const CONFIG_FILE_NAME = "suite.config.json";

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from file and environment on top of the defaults
 */
export async function loadConfig(
  configPath?: string,
  options: LoadConfigOptions = {},
): Promise<HarnessConfig> {
  let config = createDefaultConfig();

  const fileConfig = await loadConfigFile(configPath ?? getProjectConfigPath());
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, readEnvOverrides(options.env ?? process.env));

  const result = HarnessConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath,
    });
  }
  return result.data;
}

/**
 * Load a single config file, returning null if not found
 */
async function loadConfigFile(configPath: string): Promise<HarnessConfigOverrides | null> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw new ConfigError("Failed to read configuration", {
      configPath,
      cause: toError(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: toError(error),
    });
  }

  const result = HarnessConfigOverridesSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath,
    });
  }
  return result.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Deep merge configuration objects
 */
export function mergeConfig(base: HarnessConfig, override: HarnessConfigOverrides): HarnessConfig {
  return {
    abortOnFailure: override.abortOnFailure ?? base.abortOnFailure,
    reporter: { ...base.reporter, ...override.reporter },
    logging: { ...base.logging, ...override.logging },
    isolation: {
      resourceLimits: {
        ...base.isolation.resourceLimits,
        ...override.isolation?.resourceLimits,
      },
    },
  };
}

function getProjectConfigPath(): string {
  return path.join(process.cwd(), CONFIG_FILE_NAME);
}

/**
 * Check if a config file exists
 */
export async function configExists(configPath?: string): Promise<boolean> {
  try {
    await fs.access(configPath ?? getProjectConfigPath());
    return true;
  } catch {
    return false;
  }
}
