/**
 * Task Tree
 *
 * Service object owning the task stack, the animator and the terminal
 * writer. `start` and `end` mutate the stack and render synchronously under
 * the stack lock; the animator repaints spinners between them.
 */

import type { ILogObj, Logger } from "tslog";
import { resolveConfig, type TaskTreeConfig } from "../config/loader.js";
import { sleep as defaultSleep, type Sleep } from "../utils/async.js";
import { EmptyStackError } from "../utils/errors.js";
import { createChildLogger, createLogger, getLogger } from "../utils/logger.js";
import { Animator } from "./animator.js";
import { createPalette, type Palette } from "./glyphs.js";
import { TerminalOutput } from "./output.js";
import { TREE_CLOSE, renderEnd, renderOrphanEnd, renderStart } from "./renderer.js";
import { TaskStack } from "./stack.js";
import type { Task, TaskOutcome, TerminalWriter } from "./types.js";

export interface TaskTreeOptions {
  writer: TerminalWriter;
  palette: Palette;
  intervalMs: number;
  sleep?: Sleep;
  logger?: Logger<ILogObj>;
}

export class TaskTree {
  private readonly stack = new TaskStack();
  private readonly output: TerminalOutput;
  private readonly animator: Animator;
  private readonly palette: Palette;
  private readonly logger: Logger<ILogObj>;

  constructor(options: TaskTreeOptions) {
    this.palette = options.palette;
    this.logger = options.logger ?? getLogger();
    this.output = new TerminalOutput(options.writer, this.logger);
    this.animator = new Animator({
      stack: this.stack,
      output: this.output,
      palette: this.palette,
      intervalMs: options.intervalMs,
      sleep: options.sleep ?? defaultSleep,
      logger: createChildLogger(this.logger, "animator"),
    });
  }

  /**
   * Open a task below the most recent one and show it with a spinner.
   */
  start(message: string): void {
    const depth = this.stack.withLock((stack) => {
      stack.push();
      const rows = stack.rowOffsets();
      const taskDepth = rows.length - 1;

      this.output.emit(
        renderStart({
          depth: taskDepth,
          parentRowOffset: taskDepth > 0 ? rows[taskDepth - 1] : undefined,
          marker: this.palette.marker,
          message,
        }),
      );
      return taskDepth;
    });

    this.logger.debug({ event: "task_started", depth });
    this.animator.ensureRunning();
  }

  /**
   * Resolve the most recent open task with `symbol` and `message`. With no
   * task open the pair is printed as a plain line.
   */
  end(symbol: string, message: string): void {
    this.stack.withLock((stack) => {
      const task = popIfOpen(stack);
      if (!task) {
        this.logger.debug({ event: "task_end_without_task" });
        this.output.emit(renderOrphanEnd(symbol, message));
        return;
      }

      const depth = stack.size;
      let chunk = renderEnd({ rowOffset: task.rowOffset, depth, symbol, message });
      if (depth === 0) {
        chunk += TREE_CLOSE;
      }
      this.output.emit(chunk);
      this.logger.debug({ event: "task_ended", row: task.rowOffset, depth });
    });
  }

  resolve(outcome: TaskOutcome, message: string): void {
    this.end(this.palette.status[outcome], message);
  }

  /** Green check. */
  pass(message: string): void {
    this.resolve("success", message);
  }

  /** Yellow triangle. */
  warn(message: string): void {
    this.resolve("warning", message);
  }

  /** Red cross. */
  fail(message: string): void {
    this.resolve("failure", message);
  }

  /** Number of open tasks. */
  get depth(): number {
    return this.stack.withLock((stack) => stack.size);
  }

  get animating(): boolean {
    return this.animator.isActive;
  }

  get animatorLaunches(): number {
    return this.animator.launchCount;
  }

  /** Resolves when the animator has stopped after the last task ended. */
  idle(): Promise<void> {
    return this.animator.whenIdle();
  }
}

function popIfOpen(stack: TaskStack): Task | undefined {
  try {
    return stack.pop();
  } catch (error) {
    if (error instanceof EmptyStackError) {
      return undefined;
    }
    throw error;
  }
}

export interface CreateTaskTreeOptions extends Partial<TaskTreeConfig> {
  writer?: TerminalWriter;
  sleep?: Sleep;
  logger?: Logger<ILogObj>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a task tree from configuration: explicit options over
 * `TASKTREE_*` environment variables over defaults.
 */
export function createTaskTree(options: CreateTaskTreeOptions = {}): TaskTree {
  const { writer, sleep, logger, env, ...overrides } = options;
  const config = resolveConfig(overrides, env);

  return new TaskTree({
    writer: writer ?? (config.stream === "stderr" ? process.stderr : process.stdout),
    palette: createPalette(config.color),
    intervalMs: config.intervalMs,
    sleep,
    logger:
      logger ??
      createLogger({ name: "tasktree", level: config.logLevel, format: config.logFormat }),
  });
}
