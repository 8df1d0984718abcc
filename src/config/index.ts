/**
 * Configuration module exports
 */

export {
  TaskTreeConfigSchema,
  ColorModeSchema,
  LogLevelSchema,
  LogFormatSchema,
  validateConfig,
  type TaskTreeConfig,
} from "./schema.js";

export { resolveConfig } from "./loader.js";

export { readEnvConfig, ENV_KEYS } from "./env.js";
