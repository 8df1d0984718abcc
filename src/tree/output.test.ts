/**
 * Tests for best-effort terminal output
 */

import { describe, it, expect, vi } from "vitest";
import { Writable } from "node:stream";
import { TerminalOutput } from "./output.js";
import { createLogger } from "../utils/logger.js";
import { LockError } from "../utils/errors.js";

const logger = createLogger({ level: "fatal" });

describe("TerminalOutput", () => {
  it("should write the chunk and flush", () => {
    const writer = { write: vi.fn(), flush: vi.fn() };
    const output = new TerminalOutput(writer, logger);

    output.emit("\n- build");

    expect(writer.write).toHaveBeenCalledWith("\n- build");
    expect(writer.flush).toHaveBeenCalledTimes(1);
  });

  it("should skip empty chunks but still flush", () => {
    const writer = { write: vi.fn(), flush: vi.fn() };
    const output = new TerminalOutput(writer, logger);

    output.emit("");

    expect(writer.write).not.toHaveBeenCalled();
    expect(writer.flush).toHaveBeenCalledTimes(1);
  });

  it("should count and swallow write failures", () => {
    const writer = {
      write: vi.fn(() => {
        throw new Error("EPIPE");
      }),
    };
    const output = new TerminalOutput(writer, logger);

    expect(() => output.emit("a")).not.toThrow();
    expect(() => output.emit("b")).not.toThrow();
    expect(output.failedWrites).toBe(2);
  });

  it("should swallow flush failures", () => {
    const writer = {
      write: vi.fn(),
      flush: vi.fn(() => {
        throw new Error("flush failed");
      }),
    };
    const output = new TerminalOutput(writer, logger);

    expect(() => output.emit("a")).not.toThrow();
    expect(output.failedWrites).toBe(1);
  });

  it("should log swallowed failures at debug level", () => {
    const records: Array<Record<string, unknown>> = [];
    const debugLogger = createLogger({ level: "debug" });
    debugLogger.attachTransport((record) => {
      records.push({ event: record["event"], error: record["error"] });
    });
    const output = new TerminalOutput(
      {
        write: () => {
          throw new Error("EPIPE");
        },
      },
      debugLogger,
    );

    output.emit("a");

    expect(records).toEqual([{ event: "write_failed", error: "EPIPE" }]);
  });

  it("should count failures a stream reports through its error event", async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("write EPIPE"));
      },
    });
    const output = new TerminalOutput(stream, logger);

    expect(() => output.emit("a")).not.toThrow();
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(stream.listenerCount("error")).toBe(1);
    expect(output.failedWrites).toBe(1);
  });

  it("should let lock errors through", () => {
    const writer = {
      write: vi.fn(() => {
        throw new LockError("held", { lock: "task stack", reason: "reentrant" });
      }),
    };
    const output = new TerminalOutput(writer, logger);

    expect(() => output.emit("a")).toThrow(LockError);
    expect(output.failedWrites).toBe(0);
  });
});
