/**
 * Configuration schema for tasktree
 */

import { z } from "zod";

export const ColorModeSchema = z.enum(["auto", "always", "never"]);

export const LogLevelSchema = z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]);

export const LogFormatSchema = z.enum(["hidden", "pretty", "json"]);

/**
 * Complete configuration schema
 */
export const TaskTreeConfigSchema = z.object({
  intervalMs: z.number().int().min(10).max(10000).default(100),
  color: ColorModeSchema.default("auto"),
  stream: z.enum(["stdout", "stderr"]).default("stdout"),
  logLevel: LogLevelSchema.default("warn"),
  logFormat: LogFormatSchema.default("hidden"),
});

export type TaskTreeConfig = z.infer<typeof TaskTreeConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(
  config: unknown,
): { success: true; data: TaskTreeConfig } | { success: false; error: z.ZodError } {
  const result = TaskTreeConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
