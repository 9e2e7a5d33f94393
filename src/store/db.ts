/**
 * SQLite database connection and management.
 */

import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import {
  type AppliedMigration,
  type MigrationScript,
  applyMigrations,
  listAppliedMigrations,
  loadBundledMigrations,
} from "./migrations.js";

export type Row = Record<string, unknown>;

export const MEMORY_DB_PATH = ":memory:";
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export interface DbOptions {
  busyTimeoutMs?: number;
  /** Scripts to apply on connect. Defaults to the bundled set. */
  migrations?: readonly MigrationScript[];
}

export class Db {
  readonly path: string;
  private readonly busyTimeoutMs: number;
  private readonly migrations: readonly MigrationScript[] | undefined;
  private _db: Database.Database | null = null;

  constructor(dbPath: string, opts: DbOptions = {}) {
    this.path = dbPath;
    this.busyTimeoutMs = opts.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    this.migrations = opts.migrations;
  }

  get isMemory(): boolean {
    return this.path === MEMORY_DB_PATH;
  }

  connect(): void {
    if (this._db) return;

    if (!this.isMemory) {
      mkdirSync(path.dirname(this.path), { recursive: true });
    }

    const handle = new Database(this.path);
    try {
      // WAL has no meaning for an in-memory database.
      if (!this.isMemory) handle.pragma("journal_mode = WAL");
      handle.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
      handle.pragma("synchronous = NORMAL");
      handle.pragma("foreign_keys = ON");
      handle.pragma("cache_size = -64000");
      handle.pragma("temp_store = MEMORY");

      applyMigrations(handle, this.migrations ?? loadBundledMigrations());
    } catch (error) {
      handle.close();
      throw error;
    }
    this._db = handle;
  }

  close(): void {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }

  get isOpen(): boolean {
    return this._db !== null;
  }

  get db(): Database.Database {
    if (!this._db) {
      // Reconnect lazily if the handle was closed unexpectedly.
      this.connect();
    }
    if (!this._db) throw new Error("Database not connected");
    return this._db;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  run(sql: string, params: unknown[] = []): number {
    return this.db.prepare(sql).run(...params).changes;
  }

  fetchOne(sql: string, params: unknown[] = []): Row | undefined {
    return this.db.prepare(sql).get(...params) as Row | undefined;
  }

  fetchAll(sql: string, params: unknown[] = []): Row[] {
    return this.db.prepare(sql).all(...params) as Row[];
  }

  appliedMigrations(): AppliedMigration[] {
    return listAppliedMigrations(this.db);
  }
}

let _db: Db | null = null;

/**
 * Resolve the default on-disk database path: `$GANTRY_DB_PATH`, then
 * `$XDG_DATA_HOME/gantry/gantry.db`, then `~/.local/share/gantry/gantry.db`.
 */
export function defaultDbPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.GANTRY_DB_PATH) return env.GANTRY_DB_PATH;
  if (env.XDG_DATA_HOME) {
    return path.join(env.XDG_DATA_HOME, "gantry", "gantry.db");
  }
  const home = homedir();
  if (!home) return "gantry.db";
  return path.join(home, ".local", "share", "gantry", "gantry.db");
}

export function getDatabase(dbPath?: string): Db {
  if (!_db) {
    _db = new Db(dbPath ?? defaultDbPath());
    _db.connect();
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
