/**
 * Key-value store CLI commands.
 */

import { Command } from "commander";
import chalk from "chalk";
import { type KVBackend, KVNotFoundError, type KVStore, openKVStore } from "../store/kv.js";
import {
  type CliContext,
  type StoreCommandOptions,
  resolveContext,
  withStoreOptions,
} from "./shared.js";

/**
 * A one-shot command cannot keep anything in an in-memory store, so "auto"
 * means sqlite here and an unusable database fails the command.
 */
function cliBackend(configured: KVBackend): KVBackend {
  return configured === "auto" ? "sqlite" : configured;
}

function withStore<T>(ctx: CliContext, fn: (store: KVStore) => T): T {
  const store = openKVStore({
    backend: cliBackend(ctx.config.kv.backend),
    path: ctx.dbPath,
    busyTimeoutMs: ctx.config.database.busy_timeout_ms,
  });
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

export function registerKvCommands(program: Command): void {
  const kv = withStoreOptions(
    program.command("kv").description("Read and write key-value state"),
  );

  kv
    .command("get")
    .description("Print the value stored under a key")
    .argument("<key>", "Key to read")
    .action((key: string, _opts: object, cmd: Command) => {
      const ctx = resolveContext(cmd.optsWithGlobals<StoreCommandOptions>());
      const value = withStore(ctx, (store) => {
        try {
          return store.get(key);
        } catch (error) {
          if (error instanceof KVNotFoundError) return null;
          throw error;
        }
      });

      if (value === null) {
        console.error(chalk.red(`Key not found: ${key}`));
        process.exitCode = 1;
        return;
      }
      console.log(value.toString("utf-8"));
    });

  kv
    .command("set")
    .description("Store a value under a key, replacing any previous value")
    .argument("<key>", "Key to write")
    .argument("<value>", "Value to store")
    .action((key: string, value: string, _opts: object, cmd: Command) => {
      const ctx = resolveContext(cmd.optsWithGlobals<StoreCommandOptions>());
      withStore(ctx, (store) => store.set(key, value));
      console.log(chalk.green("✓") + ` Set ${key}`);
    });

  kv
    .command("delete")
    .description("Remove a key (no error if it is absent)")
    .argument("<key>", "Key to remove")
    .action((key: string, _opts: object, cmd: Command) => {
      const ctx = resolveContext(cmd.optsWithGlobals<StoreCommandOptions>());
      withStore(ctx, (store) => store.delete(key));
      console.log(chalk.green("✓") + ` Deleted ${key}`);
    });
}
