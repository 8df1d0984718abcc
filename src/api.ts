/**
 * Process-wide task tree and printf-style shortcuts.
 *
 * @example
 * task("Building %s", name);
 *   task("Compiling");
 *   pass("Compiled %d files", count);
 * pass("Built %s", name);
 */

import { format } from "node:util";
import { createTaskTree, type TaskTree } from "./tree/task-tree.js";

let defaultTree: TaskTree | null = null;

/**
 * Get the process-wide task tree, creating it from the environment on
 * first use.
 */
export function getTaskTree(): TaskTree {
  if (!defaultTree) {
    defaultTree = createTaskTree();
  }
  return defaultTree;
}

/**
 * Replace the process-wide task tree.
 */
export function setTaskTree(tree: TaskTree): void {
  defaultTree = tree;
}

/** Begin a task or subtask with a spinner. */
export function task(message: string, ...args: unknown[]): void {
  getTaskTree().start(format(message, ...args));
}

/** End the most recent task with a green check. */
export function pass(message: string, ...args: unknown[]): void {
  getTaskTree().pass(format(message, ...args));
}

/** End the most recent task with a yellow triangle. */
export function warn(message: string, ...args: unknown[]): void {
  getTaskTree().warn(format(message, ...args));
}

/** End the most recent task with a red cross. */
export function fail(message: string, ...args: unknown[]): void {
  getTaskTree().fail(format(message, ...args));
}
