/**
 * Configuration loader for tasktree
 *
 * Priority:
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Built-in defaults
 */

import { ConfigError } from "../utils/errors.js";
import { readEnvConfig } from "./env.js";
import { validateConfig, type TaskTreeConfig } from "./schema.js";

export type { TaskTreeConfig } from "./schema.js";

/**
 * Resolve the effective configuration.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(
  overrides: Partial<TaskTreeConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): TaskTreeConfig {
  const merged: Record<string, unknown> = { ...readEnvConfig(env) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = validateConfig(merged);
  if (!result.success) {
    throw new ConfigError("Invalid tasktree configuration", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
      source: "options and environment",
    });
  }

  return result.data;
}
