/**
 * Renderer
 *
 * Turns a task stack event into the exact bytes to print. Nothing here
 * touches the terminal; the caller writes the returned string in one go.
 *
 * Rows are counted upward from the last printed line, columns are 1-based
 * like the CSI `G` command.
 */

import ansiEscapes from "ansi-escapes";
import { INDENT_STEP, TREE_GLYPHS } from "./glyphs.js";

/** Printed once the last open task ends. */
export const TREE_CLOSE = "\n";

export function indentColumn(depth: number): number {
  return depth * INDENT_STEP + 1;
}

function toColumn(column: number): string {
  return ansiEscapes.cursorTo(column - 1);
}

export interface StartFrame {
  /** Depth of the new task (0 for a root task). */
  depth: number;
  /** Row offset of the parent task after the push; absent for a root task. */
  parentRowOffset?: number;
  marker: string;
  message: string;
}

/**
 * Scroll one line down, reconnect the parent's vertical line to the new
 * row and print the new task at its indent column.
 */
export function renderStart(frame: StartFrame): string {
  let out = "\n";

  if (frame.parentRowOffset !== undefined && frame.depth > 0) {
    const parentRow = frame.parentRowOffset;
    out += ansiEscapes.cursorSavePosition;

    // The sibling line right above the new row becomes a branch.
    if (parentRow > 1) {
      out +=
        ansiEscapes.cursorUp(parentRow - 1) +
        toColumn((frame.depth - 1) * INDENT_STEP + 3) +
        TREE_GLYPHS.branch;
    }

    for (let row = 1; row < parentRow; row++) {
      out += ansiEscapes.cursorBackward(1) + ansiEscapes.cursorDown(1) + TREE_GLYPHS.pipe;
    }

    out += ansiEscapes.cursorRestorePosition;
    out += " ".repeat((frame.depth - 1) * INDENT_STEP + 2) + TREE_GLYPHS.leaf;
  }

  return `${out}${frame.marker} ${frame.message}`;
}

export interface EndFrame {
  /** Row offset of the task that ended. */
  rowOffset: number;
  /** Number of tasks still open after it was popped. */
  depth: number;
  symbol: string;
  message: string;
}

/**
 * Overwrite the ended task's spinner and message in place.
 *
 * A task on the bottom row leaves the cursor after its message so later
 * output continues below it; any other row restores the cursor.
 */
export function renderEnd(frame: EndFrame): string {
  let out = ansiEscapes.cursorSavePosition;

  if (frame.rowOffset > 0) {
    out += ansiEscapes.cursorUp(frame.rowOffset);
  }

  out +=
    toColumn(indentColumn(frame.depth)) +
    `${frame.symbol} ` +
    ansiEscapes.eraseEndLine +
    frame.message;

  if (frame.rowOffset !== 0) {
    out += ansiEscapes.cursorRestorePosition;
  }

  return out;
}

/**
 * End with no task open: a plain line.
 */
export function renderOrphanEnd(symbol: string, message: string): string {
  return `${symbol} ${message}\n`;
}

/**
 * Paint `glyph` over the spinner of every open task, root first.
 */
export function renderTick(rowOffsets: readonly number[], glyph: string): string {
  let out = "";

  rowOffsets.forEach((row, depth) => {
    out += ansiEscapes.cursorSavePosition;
    if (row > 0) {
      out += ansiEscapes.cursorUp(row);
    }
    out += toColumn(indentColumn(depth)) + glyph + ansiEscapes.cursorRestorePosition;
  });

  return out;
}
