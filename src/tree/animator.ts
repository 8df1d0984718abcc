/**
 * Animator
 *
 * Background loop that repaints every open spinner once per tick. It stops
 * by itself when it finds the stack empty and is launched again by the next
 * `start` that finds it inactive.
 */

import type { ILogObj, Logger } from "tslog";
import type { Sleep } from "../utils/async.js";
import { SPINNER_FRAMES, type Palette } from "./glyphs.js";
import type { TerminalOutput } from "./output.js";
import { renderTick } from "./renderer.js";
import type { TaskStack } from "./stack.js";

export interface AnimatorOptions {
  stack: TaskStack;
  output: TerminalOutput;
  palette: Palette;
  intervalMs: number;
  sleep: Sleep;
  logger: Logger<ILogObj>;
}

export class Animator {
  private active = false;
  private launches = 0;
  private running: Promise<void> = Promise.resolve();

  constructor(private readonly options: AnimatorOptions) {}

  /** Activity flag. */
  get isActive(): boolean {
    return this.active;
  }

  /** How many loops have been launched so far. */
  get launchCount(): number {
    return this.launches;
  }

  /**
   * Claim the activity flag if it is clear. Only the caller that gets
   * `true` back may launch a loop.
   */
  tryActivate(): boolean {
    if (this.active) {
      return false;
    }
    this.active = true;
    return true;
  }

  /**
   * Launch a loop unless one is already running. Must be called outside
   * the stack lock: the first tick takes it.
   */
  ensureRunning(): boolean {
    if (!this.tryActivate()) {
      return false;
    }
    this.launches += 1;
    this.options.logger.debug({ event: "animator_launched", launches: this.launches });
    // A failed loop only stops the spinners.
    this.running = this.run().catch((error: unknown) => {
      this.options.logger.error({
        event: "animator_failed",
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return true;
  }

  /** Resolves once the current loop, if any, has stopped. Never rejects. */
  whenIdle(): Promise<void> {
    return this.running;
  }

  /**
   * Paint one frame. Returns false, with the flag cleared, once no task
   * is left.
   */
  tick(frame: string): boolean {
    const { stack, output, palette } = this.options;

    return stack.withLock((locked) => {
      if (locked.size === 0) {
        this.active = false;
        return false;
      }
      output.emit(renderTick(locked.rowOffsets(), palette.spinner(frame)));
      return true;
    });
  }

  private async run(): Promise<void> {
    let frame = 0;
    try {
      while (this.tick(SPINNER_FRAMES[frame])) {
        frame = (frame + 1) % SPINNER_FRAMES.length;
        await this.options.sleep(this.options.intervalMs);
      }
    } finally {
      this.active = false;
      this.options.logger.debug({ event: "animator_stopped" });
    }
  }
}
