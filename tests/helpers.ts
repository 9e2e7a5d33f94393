/**
 * Temp directories for file-backed database tests.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

const created: string[] = [];

export function createTempDir(): string {
  const dir = mkdtempSync(path.join(tmpdir(), "gantry-test-"));
  created.push(dir);
  return dir;
}

/** A database path in its own fresh directory. */
export function getTempDbPath(): string {
  return path.join(createTempDir(), "gantry.db");
}

/** Remove every directory handed out since the last cleanup. */
export function cleanupTempDir(): void {
  for (const dir of created.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}
