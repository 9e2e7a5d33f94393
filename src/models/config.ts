/**
 * Configuration models for gantry's config.yaml parsing and validation.
 */

import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { z } from "zod";
import YAML from "yaml";
import { DEFAULT_BUSY_TIMEOUT_MS, defaultDbPath } from "../store/db.js";
import { KV_BACKENDS } from "../store/kv.js";

export const DatabaseConfigSchema = z.object({
  path: z.string().optional(),
  busy_timeout_ms: z.number().int().nonnegative().default(DEFAULT_BUSY_TIMEOUT_MS),
});

export const KVConfigSchema = z.object({
  backend: z.enum(KV_BACKENDS).default("auto"),
});

export const GantryConfigSchema = z.object({
  database: DatabaseConfigSchema.default({}),
  kv: KVConfigSchema.default({}),
});
export type GantryConfig = z.infer<typeof GantryConfigSchema>;

/**
 * Expand a leading "~" to the home directory and $VAR / ${VAR} references
 * from the environment. Unknown variables expand to "".
 */
export function expandPath(p: string, env: NodeJS.ProcessEnv = process.env): string {
  if (!p) return p;
  let out = p;
  if (out === "~" || out.startsWith("~/")) {
    out = path.join(homedir(), out.slice(1));
  }
  return out.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_match, braced: string | undefined, bare: string | undefined) =>
      env[braced ?? bare ?? ""] ?? "",
  );
}

function findProjectConfig(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, ".gantry", "config.yaml");
    if (existsSync(candidate) && statSync(candidate).isFile()) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Ordered, de-duplicated config file candidates: explicit path,
 * $GANTRY_CONFIG, nearest .gantry/config.yaml, then the global XDG file.
 */
export function configSearchPaths(
  explicit?: string,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): string[] {
  const env = opts.env ?? process.env;
  const candidates: string[] = [];
  const push = (p: string | null | undefined): void => {
    if (!p) return;
    const normalized = path.normalize(p);
    if (!candidates.includes(normalized)) candidates.push(normalized);
  };

  push(explicit);
  push(env.GANTRY_CONFIG);
  push(findProjectConfig(opts.cwd ?? process.cwd()));
  const xdgBase = env.XDG_CONFIG_HOME || path.join(homedir(), ".config");
  push(path.join(xdgBase, "gantry", "config.yaml"));
  return candidates;
}

function applyEnvOverrides(config: GantryConfig, env: NodeJS.ProcessEnv): GantryConfig {
  const out = structuredClone(config);
  if (env.GANTRY_DB_PATH) out.database.path = env.GANTRY_DB_PATH;
  if (env.GANTRY_KV_BACKEND) {
    out.kv.backend = KVConfigSchema.shape.backend.parse(env.GANTRY_KV_BACKEND);
  }
  return out;
}

export function loadConfig(filePath: string): GantryConfig {
  const raw = readFileSync(filePath, "utf-8");
  // An empty file parses to null; treat it as "all defaults".
  const data: unknown = YAML.parse(raw) ?? {};
  return GantryConfigSchema.parse(data);
}

export function loadConfigOrDefault(filePath: string): GantryConfig {
  if (!existsSync(filePath)) return GantryConfigSchema.parse({});
  return loadConfig(filePath);
}

/**
 * Load the first existing config from configSearchPaths (or defaults),
 * then apply GANTRY_* environment overrides.
 */
export function findAndLoadConfig(
  explicit?: string,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): GantryConfig {
  const env = opts.env ?? process.env;
  for (const candidate of configSearchPaths(explicit, opts)) {
    const resolved = path.resolve(expandPath(candidate, env));
    if (existsSync(resolved)) {
      return applyEnvOverrides(loadConfig(resolved), env);
    }
  }
  return applyEnvOverrides(GantryConfigSchema.parse({}), env);
}

export function saveConfig(config: GantryConfig, filePath: string): void {
  writeFileSync(filePath, YAML.stringify(config, { sortMapEntries: false }));
}

export function resolveDbPath(
  config: GantryConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const configured = config.database.path;
  if (configured) return configured === ":memory:" ? configured : expandPath(configured, env);
  return defaultDbPath(env);
}
