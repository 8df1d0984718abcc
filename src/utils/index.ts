/**
 * Utility exports for tasktree
 */

// Logger
export {
  createLogger,
  createChildLogger,
  getLogger,
  setLogger,
  levelToNumber,
  type LogLevel,
  type LogFormat,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  TaskTreeError,
  EmptyStackError,
  LockError,
  ConfigError,
  isTaskTreeError,
  formatError,
  type ConfigIssue,
} from "./errors.js";

// Locks
export { createExclusiveLock, type ExclusiveLock } from "./lock.js";

// Async utilities
export { sleep, type Sleep } from "./async.js";
