/**
 * Demo command - render a scripted, nested build with spinners
 */

import { Command } from "commander";
import { z } from "zod";
import { createTaskTree, type TaskTree } from "../../tree/task-tree.js";
import type { TaskOutcome } from "../../tree/types.js";
import { sleep as defaultSleep, type Sleep } from "../../utils/async.js";
import { ConfigError } from "../../utils/errors.js";

const StepMsSchema = z.coerce.number().int().min(0).max(60000);

/**
 * Parse the `--step` option.
 * @throws ConfigError unless it is a whole number of milliseconds in 0..60000
 */
export function parseStepMs(value: string): number {
  const result = StepMsSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError("Invalid --step value", {
      issues: result.error.issues.map((issue) => ({ path: "step", message: issue.message })),
      source: "command line",
    });
  }
  return result.data;
}

/**
 * One scripted task and what it ends with
 */
export interface DemoStep {
  title: string;
  outcome: TaskOutcome;
  message: string;
  children?: DemoStep[];
}

export interface DemoOptions {
  /** Pause between events, in milliseconds */
  stepMs: number;
  /** Make the emit step and everything above it fail */
  fail?: boolean;
  sleep?: Sleep;
}

export function buildDemoScript(fail = false): DemoStep {
  const emit: DemoStep = fail
    ? { title: "Emitting JavaScript", outcome: "failure", message: "Emit failed: disk full" }
    : { title: "Emitting JavaScript", outcome: "success", message: "Emitted 14 files" };

  return {
    title: "Building project",
    outcome: fail ? "failure" : "success",
    message: fail ? "Build failed" : "Built project",
    children: [
      {
        title: "Resolving dependencies",
        outcome: "success",
        message: "Resolved 12 dependencies",
      },
      {
        title: "Compiling sources",
        outcome: fail ? "failure" : "success",
        message: fail ? "Compilation failed" : "Compiled sources",
        children: [
          { title: "Type-checking", outcome: "success", message: "No type errors" },
          emit,
        ],
      },
      {
        title: "Running tests",
        outcome: "warning",
        message: "Tests passed, 1 skipped",
      },
    ],
  };
}

async function runStep(tree: TaskTree, step: DemoStep, pause: () => Promise<void>): Promise<void> {
  tree.start(step.title);
  await pause();
  for (const child of step.children ?? []) {
    await runStep(tree, child, pause);
  }
  tree.resolve(step.outcome, step.message);
  await pause();
}

/**
 * Play a script on `tree` and wait for its animator to stop.
 */
export async function runDemo(
  tree: TaskTree,
  options: DemoOptions,
  script: DemoStep = buildDemoScript(options.fail),
): Promise<void> {
  const sleep = options.sleep ?? defaultSleep;
  await runStep(tree, script, () => sleep(options.stepMs));
  await tree.idle();
}

export function registerDemoCommand(program: Command): void {
  program
    .command("demo")
    .description("Render a nested build with live spinners")
    .option("-s, --step <ms>", "Pause between task events", "600")
    .option("-i, --interval <ms>", "Spinner tick interval")
    .option("--fail", "Make the build fail")
    .action(async (options: { step: string; interval?: string; fail?: boolean }) => {
      const stepMs = parseStepMs(options.step);
      const tree = createTaskTree({
        intervalMs: options.interval !== undefined ? Number(options.interval) : undefined,
      });
      await runDemo(tree, { stepMs, fail: options.fail });
    });
}
