/**
 * Async utilities for tasktree
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleep = (ms: number) => Promise<void>;
