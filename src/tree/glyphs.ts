/**
 * Glyphs drawn by the task tree and the colors they are drawn in.
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { ColorMode, TaskOutcome } from "./types.js";

/**
 * Spinner rotation, clockwise. Every open task shows the same frame.
 */
export const SPINNER_FRAMES = ["-", "\\", "|", "/"] as const;

/** Columns reserved per nesting level. */
export const INDENT_STEP = 5;

export const TREE_GLYPHS = {
  pipe: "┃",
  branch: "┣",
  leaf: "┗━ ",
} as const;

export const STATUS_GLYPHS: Record<TaskOutcome, string> = {
  success: "✔",
  warning: "▲",
  failure: "✘",
};

export const NEUTRAL_MARKER = "-";

export interface Palette {
  /** Marker printed in front of a freshly started task. */
  marker: string;
  spinner(frame: string): string;
  status: Record<TaskOutcome, string>;
}

export function chalkFor(mode: ColorMode): ChalkInstance {
  switch (mode) {
    case "never":
      return new Chalk({ level: 0 });
    case "always":
      return chalk.level > 0 ? chalk : new Chalk({ level: 1 });
    case "auto":
    default:
      return chalk;
  }
}

export function createPalette(mode: ColorMode): Palette {
  const c = chalkFor(mode);
  const attention = (text: string): string => c.yellow.bold(text);

  return {
    marker: attention(NEUTRAL_MARKER),
    spinner: attention,
    status: {
      success: c.green.bold(STATUS_GLYPHS.success),
      warning: c.yellow.bold(STATUS_GLYPHS.warning),
      failure: c.red.bold(STATUS_GLYPHS.failure),
    },
  };
}
