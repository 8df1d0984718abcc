/**
 * tasktree: nested spinner tasks for the terminal
 *
 * Each task starts as a spinner on its own line, nested under the task that
 * was open when it started, and ends as a check, triangle or cross with a
 * final message.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Task tree
export {
  TaskTree,
  createTaskTree,
  TaskStack,
  Animator,
  TerminalOutput,
  createPalette,
  renderStart,
  renderEnd,
  renderOrphanEnd,
  renderTick,
  indentColumn,
  TREE_CLOSE,
  SPINNER_FRAMES,
  INDENT_STEP,
  TREE_GLYPHS,
  STATUS_GLYPHS,
} from "./tree/index.js";
export type {
  Task,
  TaskOutcome,
  TerminalWriter,
  ColorMode,
  Palette,
  TaskTreeOptions,
  CreateTaskTreeOptions,
} from "./tree/index.js";

// Shortcuts
export { getTaskTree, setTaskTree, task, pass, warn, fail } from "./api.js";

// Configuration
export { resolveConfig, TaskTreeConfigSchema, type TaskTreeConfig } from "./config/index.js";

// Utilities
export {
  TaskTreeError,
  EmptyStackError,
  LockError,
  ConfigError,
  formatError,
} from "./utils/errors.js";
export { createLogger } from "./utils/logger.js";
