/**
 * Configuration schema for guarded-suite
 */

import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const ColorModeSchema = z.enum(["auto", "always", "never"]);

/**
 * Reporter configuration schema
 */
export const ReporterConfigSchema = z.object({
  quiet: z.boolean().default(false),
  color: ColorModeSchema.default("auto"),
});

export type ReporterConfig = z.infer<typeof ReporterConfigSchema>;

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  prettyPrint: z.boolean().default(true),
  logToFile: z.boolean().default(false),
  logDir: z.string().min(1).optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Worker thread limits for module tests
 */
export const ResourceLimitsSchema = z.object({
  maxOldGenerationSizeMb: z.number().int().positive().optional(),
  maxYoungGenerationSizeMb: z.number().int().positive().optional(),
  stackSizeMb: z.number().positive().optional(),
});

export const IsolationConfigSchema = z.object({
  resourceLimits: ResourceLimitsSchema.default({}),
});

export type IsolationConfig = z.infer<typeof IsolationConfigSchema>;

/**
 * Complete configuration schema
 */
export const HarnessConfigSchema = z.object({
  abortOnFailure: z.boolean().default(false),
  reporter: ReporterConfigSchema.default({ quiet: false, color: "auto" }),
  logging: LoggingConfigSchema.default({
    level: "info",
    prettyPrint: true,
    logToFile: false,
  }),
  isolation: IsolationConfigSchema.default({ resourceLimits: {} }),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

/**
 * Shape of a config file or env override: every key optional, no defaults,
 * so merging only sees values that were actually given
 */
export const HarnessConfigOverridesSchema = z
  .object({
    abortOnFailure: z.boolean(),
    reporter: z.object({ quiet: z.boolean(), color: ColorModeSchema }).partial(),
    logging: z
      .object({
        level: LogLevelSchema,
        prettyPrint: z.boolean(),
        logToFile: z.boolean(),
        logDir: z.string().min(1),
      })
      .partial(),
    isolation: z.object({ resourceLimits: ResourceLimitsSchema }).partial(),
  })
  .partial()
  .strict();

export type HarnessConfigOverrides = z.infer<typeof HarnessConfigOverridesSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: HarnessConfig;
  error?: z.ZodError;
} {
  const result = HarnessConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Create default configuration
 */
export function createDefaultConfig(): HarnessConfig {
  return {
    abortOnFailure: false,
    reporter: { quiet: false, color: "auto" },
    logging: { level: "info", prettyPrint: true, logToFile: false },
    isolation: { resourceLimits: {} },
  };
}
