// backend/services/timetracker/src/bootstrap.ts

/**
 * Side-effect module: import FIRST from index.ts so the env cascade is in
 * process.env before the logger and config modules evaluate.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { findRepoRoot, loadEnvCascade } from "@shared/env";
import { SERVICE_NAME } from "./config";

const serviceRoot = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  ".."
);

export const loadedEnvFiles = loadEnvCascade([
  findRepoRoot(serviceRoot),
  serviceRoot,
]);

process.env.SERVICE_NAME ??= SERVICE_NAME;
