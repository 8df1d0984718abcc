/**
 * Synchronous critical sections.
 *
 * Every caller of a lock runs on the event loop, so a section entered with
 * `withLock` cannot be interleaved with another one. What can still happen is
 * re-entry (the section calls back into code that takes the same lock) and a
 * section that throws half-way through its update. Both are treated the way a
 * poisoned mutex is: a fatal {@link LockError}. A recoverable
 * `TaskTreeError` leaves the guarded state untouched and does not poison
 * the lock.
 */

import { LockError, isTaskTreeError } from "./errors.js";

export interface ExclusiveLock {
  readonly name: string;
  isHeld(): boolean;
  isPoisoned(): boolean;
  /** Throws unless the caller is inside `withLock`. */
  assertHeld(): void;
  withLock<T>(fn: () => T): T;
}

export function createExclusiveLock(name: string): ExclusiveLock {
  let locked = false;
  let poisonedBy: Error | undefined;

  function acquire(): void {
    if (poisonedBy) {
      throw new LockError(`Lock "${name}" is poisoned`, {
        lock: name,
        reason: "poisoned",
        cause: poisonedBy,
      });
    }
    if (locked) {
      throw new LockError(`Lock "${name}" is already held`, { lock: name, reason: "reentrant" });
    }
    locked = true;
  }

  return {
    name,

    isHeld: () => locked,

    isPoisoned: () => poisonedBy !== undefined,

    assertHeld() {
      if (!locked) {
        throw new LockError(`Lock "${name}" is not held`, { lock: name, reason: "not-held" });
      }
    },

    withLock<T>(fn: () => T): T {
      acquire();
      try {
        return fn();
      } catch (error) {
        if (!(isTaskTreeError(error) && error.recoverable)) {
          poisonedBy = error instanceof Error ? error : new Error(String(error));
        }
        throw error;
      } finally {
        locked = false;
      }
    },
  };
}
