/**
 * Shared CLI utilities used by multiple command modules.
 */

import { Command } from "commander";
import { Db, type DbOptions } from "../store/db.js";
import {
  type GantryConfig,
  findAndLoadConfig,
  resolveDbPath,
} from "../models/config.js";

export interface StoreCommandOptions {
  db?: string;
  config?: string;
}

export interface CliContext {
  config: GantryConfig;
  dbPath: string;
}

/** Attach the --db / --config options shared by the db and kv groups. */
export function withStoreOptions(cmd: Command): Command {
  return cmd
    .option("--db <path>", "Database file (overrides config)")
    .option("-c, --config <path>", "Config file to load");
}

export function resolveContext(opts: StoreCommandOptions): CliContext {
  const config = findAndLoadConfig(opts.config);
  return { config, dbPath: opts.db ?? resolveDbPath(config) };
}

/**
 * Open the database, run a callback, and close it.
 * Guarantees the database is closed even if the callback throws.
 */
export function withDb<T>(
  ctx: CliContext,
  fn: (db: Db) => T,
  opts: Omit<DbOptions, "busyTimeoutMs"> = {},
): T {
  const db = new Db(ctx.dbPath, {
    ...opts,
    busyTimeoutMs: ctx.config.database.busy_timeout_ms,
  });
  db.connect();
  try {
    return fn(db);
  } finally {
    db.close();
  }
}
