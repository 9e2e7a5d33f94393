#!/usr/bin/env node
/**
 * Main CLI entry point for gantry.
 */

import { Command } from "commander";
import chalk from "chalk";
import { registerDbCommands } from "./db.js";
import { registerKvCommands } from "./kv.js";
import { VERSION } from "../version.js";

const program = new Command();

program
  .name("gantry")
  .description("Database bootstrap, migrations and key-value state for the toolkit")
  .version(VERSION);

registerDbCommands(program);
registerKvCommands(program);

try {
  program.parse();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(message));
  process.exit(1);
}
