// backend/services/shared/src/logger/logger.ts

/**
 * Process-wide pino logger.
 *
 * - Level comes from LOG_LEVEL (default "info"); an unknown level fails at import.
 * - Authorization headers and token/secret fields are removed before serialization.
 * - SERVICE_NAME, when set, is stamped on every record.
 */

import pino, { type LevelWithSilent, type LoggerOptions } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(v: string): v is LevelWithSilent {
  return LEVELS.some((l) => l === v);
}

export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? "info").trim().toLowerCase();
  if (!isLevel(v)) {
    throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  }
  return v;
}

export const REDACT_PATHS = [
  "req.headers.authorization",
  "req.headers.cookie",
  "req.body.password",
  "req.body.token",
  "req.body.secret",
  "res.headers['set-cookie']",
  "token",
  "*.token",
];

const SERVICE_NAME = process.env.SERVICE_NAME?.trim();

const options: LoggerOptions = {
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: { paths: REDACT_PATHS, remove: true },
};

export const logger = pino(options);

export function currentServiceName(): string | undefined {
  return SERVICE_NAME;
}
