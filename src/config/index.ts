export { loadConfig, mergeConfig, configExists, CONFIG_FILE_NAME } from "./loader.js";
export { readEnvOverrides } from "./env.js";
export {
  HarnessConfigSchema,
  HarnessConfigOverridesSchema,
  validateConfig,
  createDefaultConfig,
} from "./schema.js";
export type {
  HarnessConfig,
  HarnessConfigOverrides,
  ReporterConfig,
  LoggingConfig,
  IsolationConfig,
} from "./schema.js";
