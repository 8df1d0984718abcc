/**
 * Logging for tasktree
 * Based on tslog; hidden by default so log lines never land inside a task tree
 */

import { Logger, type ILogObj } from "tslog";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Where tslog sends its records. `hidden` still feeds attached transports.
 */
export type LogFormat = "hidden" | "pretty" | "json";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  format: LogFormat;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "tasktree",
  level: "warn",
  format: "hidden",
};

/**
 * Map log level string to tslog minLevel number
 */
export function levelToNumber(level: LogLevel): number {
  const levels: Record<LogLevel, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
  };
  return levels[level];
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  return new Logger<ILogObj>({
    name: finalConfig.name,
    type: finalConfig.format,
    minLevel: levelToNumber(finalConfig.level),
    prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.format === "pretty",
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

let globalLogger: Logger<ILogObj> | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Set the global logger instance
 */
export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}
