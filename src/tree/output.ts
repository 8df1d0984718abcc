/**
 * Best-effort terminal output. A failed write or flush is logged and
 * dropped; rendering never fails the caller. Lock errors raised by a writer
 * that calls back into the tree still propagate.
 *
 * Streams such as `process.stdout` report failures like EPIPE through an
 * `error` event rather than by throwing, so an emitter writer gets one
 * listener that counts those the same way.
 */

import { EventEmitter } from "node:events";
import type { ILogObj, Logger } from "tslog";
import { LockError } from "../utils/errors.js";
import type { TerminalWriter } from "./types.js";

export class TerminalOutput {
  private failures = 0;

  constructor(
    private readonly writer: TerminalWriter,
    private readonly logger: Logger<ILogObj>,
  ) {
    if (writer instanceof EventEmitter) {
      writer.on("error", (error: unknown) => this.recordFailure(error));
    }
  }

  /** Write one rendering event and flush it. */
  emit(chunk: string): void {
    try {
      if (chunk.length > 0) {
        this.writer.write(chunk);
      }
      this.writer.flush?.();
    } catch (error) {
      if (error instanceof LockError) {
        throw error;
      }
      this.recordFailure(error);
    }
  }

  get failedWrites(): number {
    return this.failures;
  }

  private recordFailure(error: unknown): void {
    this.failures += 1;
    this.logger.debug({
      event: "write_failed",
      failures: this.failures,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
