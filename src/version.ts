/**
 * Package version, read from package.json so there is one place to bump it.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkgPath = join(__dirname, "..", "package.json");
const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(pkgPath, "utf-8")));

export const VERSION: string = pkg.version;
