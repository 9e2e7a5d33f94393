/**
 * Migration scripts bundled with gantry. Filenames follow
 * `<version>_<name>.sql`; append new entries, never edit applied ones.
 */

import type { MigrationFile } from "./migrations.js";

export const BUNDLED_MIGRATIONS: readonly MigrationFile[] = [
  {
    filename: "001_initial_schema.sql",
    body: `
    -- Work sessions recorded by the toolkit
    CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        project_path TEXT,
        status TEXT NOT NULL DEFAULT 'active',
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status);

    -- Free-form toolkit settings
    CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
    `,
  },
  {
    filename: "002_external_repos.sql",
    body: `
    -- Repositories cloned or tracked outside the workspace
    CREATE TABLE IF NOT EXISTS external_repos (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        url TEXT NOT NULL UNIQUE,
        local_path TEXT NOT NULL,
        default_branch TEXT,
        last_synced_at TEXT,
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
    CREATE INDEX IF NOT EXISTS idx_external_repos_name ON external_repos(name);
    `,
  },
  {
    filename: "003_repo_dependencies.sql",
    body: `
    -- Dependencies declared by tracked repositories
    CREATE TABLE IF NOT EXISTS repo_dependencies (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        repo_id INTEGER NOT NULL REFERENCES external_repos(id) ON DELETE CASCADE,
        ecosystem TEXT NOT NULL,
        package_name TEXT NOT NULL,
        version_spec TEXT,
        is_dev INTEGER NOT NULL DEFAULT 0,
        UNIQUE (repo_id, ecosystem, package_name)
    );
    CREATE INDEX IF NOT EXISTS idx_repo_dependencies_package
        ON repo_dependencies(ecosystem, package_name);
    `,
  },
  {
    filename: "004_env_backups.sql",
    body: `
    -- Snapshots of environment files taken before they are rewritten
    CREATE TABLE IF NOT EXISTS env_backups (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        project_path TEXT NOT NULL,
        file_name TEXT NOT NULL,
        content TEXT NOT NULL,
        checksum TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
    CREATE INDEX IF NOT EXISTS idx_env_backups_project
        ON env_backups(project_path, created_at);
    `,
  },
];
