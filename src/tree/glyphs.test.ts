/**
 * Tests for glyph constants and palettes
 */

import { describe, it, expect } from "vitest";
import chalk from "chalk";
import { SPINNER_FRAMES, STATUS_GLYPHS, chalkFor, createPalette } from "./glyphs.js";

describe("SPINNER_FRAMES", () => {
  it("should rotate clockwise through four frames", () => {
    expect(SPINNER_FRAMES).toEqual(["-", "\\", "|", "/"]);
  });
});

describe("createPalette", () => {
  it("should print bare glyphs without color", () => {
    const palette = createPalette("never");

    expect(palette.marker).toBe("-");
    expect(palette.spinner("|")).toBe("|");
    expect(palette.status).toEqual(STATUS_GLYPHS);
  });

  it("should use bold green, yellow and red when color is forced", () => {
    const palette = createPalette("always");

    expect(palette.status.success).toBe("\x1b[32m\x1b[1m✔\x1b[22m\x1b[39m");
    expect(palette.status.warning).toBe("\x1b[33m\x1b[1m▲\x1b[22m\x1b[39m");
    expect(palette.status.failure).toBe("\x1b[31m\x1b[1m✘\x1b[22m\x1b[39m");
    expect(palette.marker).toBe("\x1b[33m\x1b[1m-\x1b[22m\x1b[39m");
    expect(palette.spinner("/")).toBe("\x1b[33m\x1b[1m/\x1b[22m\x1b[39m");
  });
});

describe("chalkFor", () => {
  it("should defer to chalk's own detection in auto mode", () => {
    expect(chalkFor("auto")).toBe(chalk);
  });

  it("should disable color in never mode", () => {
    expect(chalkFor("never").level).toBe(0);
  });

  it("should enable at least basic color in always mode", () => {
    expect(chalkFor("always").level).toBeGreaterThan(0);
  });
});
