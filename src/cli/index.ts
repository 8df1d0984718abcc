#!/usr/bin/env node

/**
 * tasktree CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerDemoCommand } from "./commands/demo.js";
import { registerConfigCommand } from "./commands/config.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("tasktree")
  .description("Nested spinner tasks for the terminal")
  .version(VERSION, "-v, --version", "Output the current version");

registerDemoCommand(program);
registerConfigCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
