/**
 * Database CLI commands: path, migrate, status.
 */

import { existsSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import Table from "cli-table3";
import { MEMORY_DB_PATH } from "../store/db.js";
import {
  type AppliedMigration,
  type MigrationInfo,
  type MigrationScript,
  applyMigrations,
  listBundledMigrations,
  loadBundledMigrations,
  migrationLabel,
  pendingMigrations,
} from "../store/migrations.js";
import {
  type CliContext,
  type StoreCommandOptions,
  resolveContext,
  withDb,
  withStoreOptions,
} from "./shared.js";

interface MigrationStatus {
  pending: MigrationInfo[];
  applied: AppliedMigration[];
}

/** Status is read-only: a missing database is reported, never created. */
function readStatus(ctx: CliContext, scripts: readonly MigrationScript[]): MigrationStatus {
  if (ctx.dbPath !== MEMORY_DB_PATH && !existsSync(ctx.dbPath)) {
    console.log(chalk.yellow(`No database at ${ctx.dbPath}.`));
    return { pending: listBundledMigrations(scripts), applied: [] };
  }
  return withDb(
    ctx,
    (conn) => ({
      pending: pendingMigrations(conn.db, scripts),
      applied: conn.appliedMigrations(),
    }),
    { migrations: [] },
  );
}

export function registerDbCommands(program: Command): void {
  const db = withStoreOptions(
    program.command("db").description("Inspect and migrate the database"),
  );

  db
    .command("path")
    .description("Print the resolved database path")
    .action((_opts: object, cmd: Command) => {
      const ctx = resolveContext(cmd.optsWithGlobals<StoreCommandOptions>());
      console.log(ctx.dbPath);
    });

  db
    .command("migrate")
    .description("Apply pending migrations")
    .action((_opts: object, cmd: Command) => {
      const ctx = resolveContext(cmd.optsWithGlobals<StoreCommandOptions>());
      // Connect with no scripts so the bundled ones are applied (and
      // reported) here rather than silently during connect.
      const applied = withDb(
        ctx,
        (conn) => applyMigrations(conn.db, loadBundledMigrations()),
        { migrations: [] },
      );

      if (!applied.length) {
        console.log(chalk.dim("Database is up to date."));
        return;
      }
      for (const m of applied) {
        console.log(chalk.green("✓") + ` Applied ${migrationLabel(m)}`);
      }
    });

  db
    .command("status")
    .description("Show bundled migrations and whether each is applied")
    .action((_opts: object, cmd: Command) => {
      const ctx = resolveContext(cmd.optsWithGlobals<StoreCommandOptions>());
      const scripts = loadBundledMigrations();

      const { pending, applied } = readStatus(ctx, scripts);
      const pendingVersions = new Set(pending.map((m) => m.version));
      const appliedAt = new Map(applied.map((a) => [a.version, a.appliedAt]));

      const table = new Table({
        head: ["Version", "Name", "Status", "Applied At"],
      });
      for (const m of listBundledMigrations(scripts)) {
        const isPending = pendingVersions.has(m.version);
        table.push([
          String(m.version),
          m.name,
          isPending ? chalk.yellow("pending") : chalk.green("applied"),
          appliedAt.get(m.version) ?? "-",
        ]);
      }
      // Recorded by a newer build; this binary does not know the script.
      const bundledVersions = new Set(scripts.map((s) => s.version));
      for (const a of applied) {
        if (bundledVersions.has(a.version)) continue;
        table.push([String(a.version), a.name, chalk.red("unknown"), a.appliedAt]);
      }

      console.log(table.toString());
    });
}
