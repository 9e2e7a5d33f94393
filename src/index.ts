/**
 * gantry — embedded database bootstrap, migrations and key-value state.
 */

export {
  Db,
  type DbOptions,
  type Row,
  defaultDbPath,
  getDatabase,
  closeDatabase,
} from "./store/db.js";
export {
  MigrationError,
  type MigrationErrorKind,
  type MigrationScript,
  type MigrationFile,
  type MigrationInfo,
  type AppliedMigration,
  parseMigrationFilename,
  discoverMigrations,
  loadBundledMigrations,
  ensureMigrationsTable,
  applyMigrations,
  pendingMigrations,
  listBundledMigrations,
  listAppliedMigrations,
  migrationLabel,
} from "./store/migrations.js";
export { BUNDLED_MIGRATIONS } from "./store/sql.js";
export {
  type KVStore,
  type KVEntry,
  type KVBackend,
  KV_BACKENDS,
  KVNotFoundError,
  KVDecodeError,
  KVEncodeError,
  SqliteKVStore,
  MemoryKVStore,
  openKVStore,
  getJSON,
  setJSON,
} from "./store/kv.js";
export type { GantryConfig } from "./models/config.js";
export {
  GantryConfigSchema,
  loadConfig,
  loadConfigOrDefault,
  findAndLoadConfig,
  configSearchPaths,
  saveConfig,
  expandPath,
  resolveDbPath,
} from "./models/config.js";
export { VERSION } from "./version.js";
