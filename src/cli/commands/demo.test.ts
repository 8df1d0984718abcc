/**
 * Tests for the demo command
 */

import { describe, it, expect } from "vitest";
import ansiEscapes from "ansi-escapes";
import { buildDemoScript, parseStepMs, runDemo } from "./demo.js";
import { TaskTree } from "../../tree/task-tree.js";
import { createPalette } from "../../tree/glyphs.js";
import { createLogger } from "../../utils/logger.js";
import { ConfigError } from "../../utils/errors.js";

const SAVE = ansiEscapes.cursorSavePosition;
const RESTORE = ansiEscapes.cursorRestorePosition;

const immediate = (): Promise<void> => Promise.resolve();

function createTree(chunks: string[]): TaskTree {
  return new TaskTree({
    writer: { write: (chunk: string) => chunks.push(chunk) },
    palette: createPalette("never"),
    intervalMs: 100,
    sleep: immediate,
    logger: createLogger({ level: "fatal" }),
  });
}

describe("buildDemoScript", () => {
  it("should nest dependencies, compilation and tests under the build", () => {
    const script = buildDemoScript();

    expect(script.title).toBe("Building project");
    expect(script.children?.map((child) => child.title)).toEqual([
      "Resolving dependencies",
      "Compiling sources",
      "Running tests",
    ]);
    expect(script.children?.[1]?.children?.map((child) => child.title)).toEqual([
      "Type-checking",
      "Emitting JavaScript",
    ]);
  });

  it("should fail the emit step and everything above it", () => {
    const script = buildDemoScript(true);

    expect(script.outcome).toBe("failure");
    expect(script.children?.[1]?.outcome).toBe("failure");
    expect(script.children?.[1]?.children?.[1]?.outcome).toBe("failure");
    expect(script.children?.[0]?.outcome).toBe("success");
  });
});

describe("runDemo", () => {
  it("should play the build and leave the tree idle", async () => {
    const chunks: string[] = [];
    const tree = createTree(chunks);

    await runDemo(tree, { stepMs: 0, sleep: immediate });

    expect(tree.depth).toBe(0);
    expect(tree.animating).toBe(false);
    expect(tree.animatorLaunches).toBe(1);
    expect(chunks[0]).toBe("\n- Building project");
    expect(chunks).toContain(`${SAVE}\x1b[6G✔ \x1b[KResolved 12 dependencies`);
    expect(chunks).toContain(`${SAVE}\x1b[2A\x1b[6G✔ \x1b[KCompiled sources${RESTORE}`);
    expect(chunks[chunks.length - 1]).toBe(
      `${SAVE}\x1b[5A\x1b[1G✔ \x1b[KBuilt project${RESTORE}\n`,
    );
  });

  it("should end with a red cross when asked to fail", async () => {
    const chunks: string[] = [];
    const tree = createTree(chunks);

    await runDemo(tree, { stepMs: 0, fail: true, sleep: immediate });

    expect(chunks).toContain(`${SAVE}\x1b[11G✘ \x1b[KEmit failed: disk full`);
    expect(chunks[chunks.length - 1]).toBe(
      `${SAVE}\x1b[5A\x1b[1G✘ \x1b[KBuild failed${RESTORE}\n`,
    );
  });
});

describe("parseStepMs", () => {
  it("should accept a whole number of milliseconds", () => {
    expect(parseStepMs("600")).toBe(600);
    expect(parseStepMs("0")).toBe(0);
  });

  it("should reject text, fractions and out-of-range pauses", () => {
    expect(() => parseStepMs("abc")).toThrow(ConfigError);
    expect(() => parseStepMs("12.5")).toThrow(ConfigError);
    expect(() => parseStepMs("-1")).toThrow(ConfigError);
    expect(() => parseStepMs("60001")).toThrow(ConfigError);
  });

  it("should name the option in the error issues", () => {
    try {
      parseStepMs("abc");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).issues.map((issue) => issue.path)).toEqual(["step"]);
    }
  });
});
