/**
 * Key-value state store with a durable SQLite backend and an in-memory
 * fallback. Both satisfy the same KVStore contract, so callers can degrade
 * to ephemeral state without touching call sites.
 */

import type { z } from "zod";
import { Db, type DbOptions, defaultDbPath } from "./db.js";

export interface KVEntry {
  key: string;
  value: Buffer;
  /** Milliseconds since epoch; never decreases for a given key. */
  updatedAt: number;
}

export interface KVStore {
  /** Throws KVNotFoundError when the key is absent. */
  get(key: string): Buffer;
  /** Like get, with the entry's bookkeeping. */
  entry(key: string): KVEntry;
  set(key: string, value: Uint8Array | string): void;
  /** Deleting an absent key is a no-op. */
  delete(key: string): void;
  close(): void;
}

export const KV_BACKENDS = ["auto", "sqlite", "memory"] as const;
export type KVBackend = (typeof KV_BACKENDS)[number];

// Errors

export class KVNotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`kv: key not found: "${key}"`);
    this.name = "KVNotFoundError";
    this.key = key;
  }
}

export class KVDecodeError extends Error {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`kv: cannot decode value for "${key}": ${detail}`, { cause });
    this.name = "KVDecodeError";
    this.key = key;
  }
}

export class KVEncodeError extends Error {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`kv: cannot encode value for "${key}": ${detail}`, { cause });
    this.name = "KVEncodeError";
    this.key = key;
  }
}

function toBuffer(value: Uint8Array | string): Buffer {
  return typeof value === "string" ? Buffer.from(value, "utf-8") : Buffer.from(value);
}

// SQLite backend

const KV_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS kv_store (
    key TEXT PRIMARY KEY,
    value BLOB NOT NULL,
    updated_at INTEGER NOT NULL
  )
`;

export interface SqliteKVStoreOptions {
  /** Close the Db when the store is closed. */
  ownsConnection?: boolean;
}

export class SqliteKVStore implements KVStore {
  private readonly ownsConnection: boolean;

  constructor(
    private readonly db: Db,
    opts: SqliteKVStoreOptions = {},
  ) {
    this.ownsConnection = opts.ownsConnection ?? false;
    this.db.exec(KV_TABLE_DDL);
  }

  /** Open (creating if needed) the database at dbPath and own its connection. */
  static open(dbPath: string = defaultDbPath(), opts: DbOptions = {}): SqliteKVStore {
    const db = new Db(dbPath, opts);
    db.connect();
    try {
      return new SqliteKVStore(db, { ownsConnection: true });
    } catch (error) {
      db.close();
      throw error;
    }
  }

  get(key: string): Buffer {
    return this.entry(key).value;
  }

  entry(key: string): KVEntry {
    const row = this.db.fetchOne(
      "SELECT value, updated_at FROM kv_store WHERE key = ?",
      [key],
    );
    if (!row) throw new KVNotFoundError(key);
    const value = row.value;
    return {
      key,
      // Rows written as TEXT by older tooling come back as strings.
      value: Buffer.isBuffer(value) ? value : toBuffer(String(value)),
      updatedAt: Number(row.updated_at),
    };
  }

  set(key: string, value: Uint8Array | string): void {
    this.db.run(
      // A zero-length buffer may bind as NULL; store it as an empty blob.
      `INSERT INTO kv_store (key, value, updated_at) VALUES (?, COALESCE(?, X''), ?)
       ON CONFLICT(key) DO UPDATE SET
         value = excluded.value,
         updated_at = MAX(kv_store.updated_at, excluded.updated_at)`,
      [key, toBuffer(value), Date.now()],
    );
  }

  delete(key: string): void {
    this.db.run("DELETE FROM kv_store WHERE key = ?", [key]);
  }

  close(): void {
    if (this.ownsConnection) this.db.close();
  }
}

// In-memory backend

export class MemoryKVStore implements KVStore {
  private readonly data = new Map<string, KVEntry>();

  get(key: string): Buffer {
    return this.entry(key).value;
  }

  entry(key: string): KVEntry {
    const found = this.data.get(key);
    if (!found) throw new KVNotFoundError(key);
    return { ...found, value: Buffer.from(found.value) };
  }

  set(key: string, value: Uint8Array | string): void {
    const previous = this.data.get(key);
    this.data.set(key, {
      key,
      value: toBuffer(value),
      updatedAt: Math.max(Date.now(), previous?.updatedAt ?? 0),
    });
  }

  delete(key: string): void {
    this.data.delete(key);
  }

  close(): void {
    this.data.clear();
  }
}

// Backend selection

export interface OpenKVStoreOptions extends DbOptions {
  backend?: KVBackend;
  path?: string;
}

/**
 * Open a store for the requested backend. "auto" prefers SQLite and falls
 * back to memory when the database cannot be opened.
 */
export function openKVStore(opts: OpenKVStoreOptions = {}): KVStore {
  const { backend = "auto", path, ...dbOptions } = opts;
  if (backend === "memory") return new MemoryKVStore();
  if (backend === "sqlite") return SqliteKVStore.open(path, dbOptions);

  try {
    return SqliteKVStore.open(path, dbOptions);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(
      `[gantry] warning: durable kv store unavailable (${message}); using in-memory store\n`,
    );
    return new MemoryKVStore();
  }
}

// Typed JSON helpers

/**
 * Read key as JSON validated by schema. Absence keeps surfacing as
 * KVNotFoundError; malformed or mismatched data raises KVDecodeError.
 */
export function getJSON<T>(
  store: KVStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const raw = store.get(key);
  let data: unknown;
  try {
    data = JSON.parse(raw.toString("utf-8"));
  } catch (error) {
    throw new KVDecodeError(key, error);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new KVDecodeError(key, parsed.error);
  return parsed.data;
}

export function setJSON<T>(store: KVStore, key: string, value: T): void {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    throw new KVEncodeError(key, error);
  }
  if (encoded === undefined) {
    throw new KVEncodeError(key, new TypeError(`${typeof value} is not JSON-serializable`));
  }
  store.set(key, encoded);
}
