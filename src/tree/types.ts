/**
 * Task tree types
 */

/**
 * One open task. Its depth is its index in the stack.
 */
export interface Task {
  /** Rows between this task's line and the last printed line. */
  rowOffset: number;
}

export type TaskOutcome = "success" | "warning" | "failure";

/**
 * Where rendered frames go. `process.stdout` satisfies it.
 */
export interface TerminalWriter {
  write(chunk: string): unknown;
  flush?(): void;
}

export type ColorMode = "auto" | "always" | "never";
