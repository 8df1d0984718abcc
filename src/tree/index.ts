/**
 * Task tree module exports
 */

// Types
export type { Task, TaskOutcome, TerminalWriter, ColorMode } from "./types.js";

// Stack
export { TaskStack } from "./stack.js";

// Rendering
export {
  TREE_CLOSE,
  indentColumn,
  renderStart,
  renderEnd,
  renderOrphanEnd,
  renderTick,
  type StartFrame,
  type EndFrame,
} from "./renderer.js";
export {
  SPINNER_FRAMES,
  INDENT_STEP,
  TREE_GLYPHS,
  STATUS_GLYPHS,
  NEUTRAL_MARKER,
  createPalette,
  type Palette,
} from "./glyphs.js";
export { TerminalOutput } from "./output.js";

// Animation
export { Animator, type AnimatorOptions } from "./animator.js";

// Service
export {
  TaskTree,
  createTaskTree,
  type TaskTreeOptions,
  type CreateTaskTreeOptions,
} from "./task-tree.js";
