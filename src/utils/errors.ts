/**
 * Error handling for tasktree
 * Custom error types with context and recovery information
 */

/**
 * Base error class for tasktree
 */
export class TaskTreeError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "TaskTreeError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, TaskTreeError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Raised by `TaskStack.pop()` when no task is open.
 * The lifecycle API turns it into a plain-line print.
 */
export class EmptyStackError extends TaskTreeError {
  constructor(message = "No task is open") {
    super(message, {
      code: "EMPTY_STACK",
      recoverable: true,
      suggestion: "Every end call must match an earlier start call",
    });
    this.name = "EmptyStackError";
  }
}

/**
 * Lock acquisition failure: re-entry into a held lock, or use of a lock
 * whose holder threw. Always a programming error.
 */
export class LockError extends TaskTreeError {
  readonly lock: string;

  constructor(
    message: string,
    options: {
      lock: string;
      reason: "reentrant" | "poisoned" | "not-held";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "LOCK_ERROR",
      context: { lock: options.lock, reason: options.reason },
      recoverable: false,
      suggestion: "Do not call start or end from inside a terminal writer",
      cause: options.cause,
    });
    this.name = "LockError";
    this.lock = options.lock;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends TaskTreeError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      source?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { source: options.source, issues: options.issues },
      recoverable: true,
      suggestion: "Check the TASKTREE_* environment variables and the options you passed",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Check if error is a tasktree error
 */
export function isTaskTreeError(error: unknown): error is TaskTreeError {
  return error instanceof TaskTreeError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  EMPTY_STACK: "Every end call must match an earlier start call.",
  LOCK_ERROR: "The task stack was used re-entrantly or after a failure while it was held.",
  CONFIG_ERROR: "Check the TASKTREE_* environment variables and the options you passed.",
  UNEXPECTED_ERROR: "An unexpected error occurred.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof TaskTreeError) {
    let message = `[${error.code}] ${error.message}`;
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}
