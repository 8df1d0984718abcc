/**
 * Config command - show the configuration tasktree resolves
 */

import { Command } from "commander";
import chalk from "chalk";
import { resolveConfig, type TaskTreeConfig } from "../../config/loader.js";

export function formatConfig(config: TaskTreeConfig, json = false): string {
  if (json) {
    return JSON.stringify(config, null, 2);
  }

  return Object.entries(config)
    .map(([key, value]) => `${chalk.bold(key)}: ${String(value)}`)
    .join("\n");
}

export function registerConfigCommand(
  program: Command,
  print: (text: string) => void = console.log,
): void {
  program
    .command("config")
    .description("Show the resolved configuration (defaults, then TASKTREE_* variables)")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      print(formatConfig(resolveConfig(), options.json));
    });
}
