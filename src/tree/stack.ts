/**
 * Task Stack
 *
 * The open tasks, root first, each remembering how many rows the terminal
 * has printed below its own line since it was drawn.
 */

import { EmptyStackError } from "../utils/errors.js";
import { createExclusiveLock, type ExclusiveLock } from "../utils/lock.js";
import type { Task } from "./types.js";

export class TaskStack {
  private readonly tasks: Task[] = [];
  private readonly lock: ExclusiveLock = createExclusiveLock("task stack");

  /**
   * Run `fn` with exclusive access to the stack. `push`, `pop` and the
   * readers below may only be called from inside it.
   */
  withLock<T>(fn: (stack: this) => T): T {
    return this.lock.withLock(() => fn(this));
  }

  /**
   * Open a new task on the bottom row. Every task already open moves one
   * row further from the bottom.
   */
  push(): Task {
    this.lock.assertHeld();
    for (const task of this.tasks) {
      task.rowOffset += 1;
    }
    const task: Task = { rowOffset: 0 };
    this.tasks.push(task);
    return { ...task };
  }

  /**
   * Close the most recently opened task.
   * @throws EmptyStackError when no task is open
   */
  pop(): Task {
    this.lock.assertHeld();
    const task = this.tasks.pop();
    if (!task) {
      throw new EmptyStackError();
    }
    return task;
  }

  peek(): Task | undefined {
    this.lock.assertHeld();
    const last = this.tasks[this.tasks.length - 1];
    return last ? { ...last } : undefined;
  }

  get size(): number {
    this.lock.assertHeld();
    return this.tasks.length;
  }

  /** Row offsets from the root task down to the deepest one. */
  rowOffsets(): number[] {
    this.lock.assertHeld();
    return this.tasks.map((task) => task.rowOffset);
  }
}
