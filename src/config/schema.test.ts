/**
 * Tests for configuration schema
 */

import { describe, it, expect } from "vitest";
import { TaskTreeConfigSchema, validateConfig } from "./schema.js";

describe("TaskTreeConfigSchema", () => {
  it("should fill in defaults", () => {
    expect(TaskTreeConfigSchema.parse({})).toEqual({
      intervalMs: 100,
      color: "auto",
      stream: "stdout",
      logLevel: "warn",
      logFormat: "hidden",
    });
  });

  it("should accept a full configuration", () => {
    const config = {
      intervalMs: 80,
      color: "never",
      stream: "stderr",
      logLevel: "debug",
      logFormat: "json",
    };

    expect(TaskTreeConfigSchema.parse(config)).toEqual(config);
  });

  it("should reject intervals outside 10..10000 ms", () => {
    expect(TaskTreeConfigSchema.safeParse({ intervalMs: 5 }).success).toBe(false);
    expect(TaskTreeConfigSchema.safeParse({ intervalMs: 20000 }).success).toBe(false);
    expect(TaskTreeConfigSchema.safeParse({ intervalMs: 12.5 }).success).toBe(false);
  });

  it("should reject unknown color modes", () => {
    expect(TaskTreeConfigSchema.safeParse({ color: "sometimes" }).success).toBe(false);
  });
});

describe("validateConfig", () => {
  it("should return data for a valid config", () => {
    const result = validateConfig({ color: "always" });

    expect(result.success && result.data.color).toBe("always");
  });

  it("should return the zod error for an invalid config", () => {
    const result = validateConfig({ stream: "tty" });

    expect(result.success).toBe(false);
    expect(result.success ? [] : result.error.issues[0]?.path).toEqual(["stream"]);
  });
});
