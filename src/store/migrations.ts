/**
 * Schema migrations for the gantry database.
 *
 * Migration scripts are bundled in code (see sql.ts) under
 * `<version>_<name>.sql` filenames. Each one is applied at most once per database,
 * in ascending version order, inside its own transaction together with its
 * `schema_migrations` record.
 */

import type Database from "better-sqlite3";
import { BUNDLED_MIGRATIONS } from "./sql.js";

export interface MigrationScript {
  readonly version: number;
  readonly name: string;
  readonly body: string;
}

export interface MigrationFile {
  filename: string;
  body: string;
}

export interface MigrationInfo {
  version: number;
  name: string;
}

export interface AppliedMigration extends MigrationInfo {
  appliedAt: string;
}

export type MigrationErrorKind = "discovery" | "bookkeeping" | "apply";

export class MigrationError extends Error {
  readonly kind: MigrationErrorKind;
  readonly version?: number;
  readonly migrationName?: string;

  constructor(
    kind: MigrationErrorKind,
    message: string,
    opts: { cause?: unknown; version?: number; migrationName?: string } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = "MigrationError";
    this.kind = kind;
    this.version = opts.version;
    this.migrationName = opts.migrationName;
  }
}

const FILENAME_PATTERN = /^(\d+)_(.+)\.sql$/;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Zero-padded label used in diagnostics, e.g. `003_repo_dependencies`. */
export function migrationLabel(m: MigrationInfo): string {
  return `${String(m.version).padStart(3, "0")}_${m.name}`;
}

/**
 * Split a bundled filename into version and name.
 * Returns null for anything that is not a migration script.
 */
export function parseMigrationFilename(
  filename: string,
): { version: number; name: string } | null {
  const match = FILENAME_PATTERN.exec(filename);
  if (!match) return null;
  const version = Number.parseInt(match[1], 10);
  if (!Number.isSafeInteger(version) || version < 1) return null;
  return { version, name: match[2] };
}

/**
 * Turn raw bundle entries into an ordered script list. Entries whose
 * filename does not parse are skipped; two entries sharing a version
 * reject the whole bundle.
 */
export function discoverMigrations(files: Iterable<MigrationFile>): MigrationScript[] {
  const byVersion = new Map<number, { filename: string; script: MigrationScript }>();

  for (const file of files) {
    const parsed = parseMigrationFilename(file.filename);
    if (!parsed) continue;

    const existing = byVersion.get(parsed.version);
    if (existing) {
      throw new MigrationError(
        "discovery",
        `duplicate migration version ${parsed.version}: ${existing.filename} and ${file.filename}`,
        { version: parsed.version },
      );
    }
    byVersion.set(parsed.version, {
      filename: file.filename,
      script: Object.freeze({ ...parsed, body: file.body }),
    });
  }

  return [...byVersion.values()]
    .map((entry) => entry.script)
    .sort((a, b) => a.version - b.version);
}

export function loadBundledMigrations(): MigrationScript[] {
  return discoverMigrations(BUNDLED_MIGRATIONS);
}

export function ensureMigrationsTable(db: Database.Database): void {
  try {
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);
  } catch (error) {
    throw new MigrationError(
      "bookkeeping",
      `create schema_migrations: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

function loadAppliedVersions(db: Database.Database): Set<number> {
  try {
    const rows = db
      .prepare("SELECT version FROM schema_migrations")
      .all() as { version: number }[];
    return new Set(rows.map((r) => r.version));
  } catch (error) {
    throw new MigrationError(
      "bookkeeping",
      `read schema_migrations: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

function applyOne(db: Database.Database, script: MigrationScript): void {
  const record = db.prepare(
    "INSERT INTO schema_migrations (version, name) VALUES (?, ?)",
  );
  db.transaction(() => {
    db.exec(script.body);
    record.run(script.version, script.name);
  })();
}

/**
 * Apply every script not yet recorded in `schema_migrations`.
 * Stops at the first failing script; scripts before it stay committed.
 * Returns the scripts applied by this call.
 */
export function applyMigrations(
  db: Database.Database,
  scripts: readonly MigrationScript[],
): MigrationInfo[] {
  ensureMigrationsTable(db);
  const applied = loadAppliedVersions(db);
  const ordered = [...scripts].sort((a, b) => a.version - b.version);
  const result: MigrationInfo[] = [];

  for (const script of ordered) {
    if (applied.has(script.version)) continue;
    try {
      applyOne(db, script);
    } catch (error) {
      throw new MigrationError(
        "apply",
        `apply migration ${migrationLabel(script)}: ${errorMessage(error)}`,
        { cause: error, version: script.version, migrationName: script.name },
      );
    }
    applied.add(script.version);
    result.push({ version: script.version, name: script.name });
  }
  return result;
}

export function pendingMigrations(
  db: Database.Database,
  scripts: readonly MigrationScript[],
): MigrationInfo[] {
  const applied = loadAppliedVersions(db);
  return listBundledMigrations(scripts).filter((m) => !applied.has(m.version));
}

export function listBundledMigrations(
  scripts: readonly MigrationScript[] = loadBundledMigrations(),
): MigrationInfo[] {
  return [...scripts]
    .sort((a, b) => a.version - b.version)
    .map((s) => ({ version: s.version, name: s.name }));
}

export function listAppliedMigrations(db: Database.Database): AppliedMigration[] {
  const rows = db
    .prepare(
      "SELECT version, name, applied_at FROM schema_migrations ORDER BY version",
    )
    .all() as { version: number; name: string; applied_at: string }[];
  return rows.map((r) => ({
    version: r.version,
    name: r.name,
    appliedAt: r.applied_at,
  }));
}
