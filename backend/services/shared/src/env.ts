// backend/services/shared/src/env.ts

/**
 * Cascading env-file loader.
 *
 * For each directory, in order, tries `.env`, `.env.<mode>`, `.env.local`.
 * Later files override earlier ones; anything already in process.env wins
 * over every file. `${VAR}` references are expanded.
 *
 * Boot policy (what is required, defaults) lives in each service's config.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

export function envFileCandidates(dirs: string[], mode: string): string[] {
  const names = [".env", `.env.${mode}`, ".env.local"];
  return dirs.flatMap((d) => names.map((n) => path.resolve(d, n)));
}

/** Returns the files that were actually loaded, in load order. */
export function loadEnvCascade(
  dirs: string[],
  mode: string = process.env.NODE_ENV?.trim() || "development"
): string[] {
  const loaded = envFileCandidates(dirs, mode).filter((f) => fs.existsSync(f));
  const merged: Record<string, string> = {};
  for (const file of loaded) {
    Object.assign(merged, dotenv.parse(fs.readFileSync(file)));
  }
  dotenvExpand.expand({ parsed: merged });
  return loaded;
}

/** Walk up from `start` to the directory holding the root package.json. */
export function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) lastHit = dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start);
}
