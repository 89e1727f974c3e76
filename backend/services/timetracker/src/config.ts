// backend/services/timetracker/src/config.ts

/**
 * Typed service configuration.
 *
 * - No dotenv loading here (index.ts loads the env cascade first).
 * - `loadConfig` validates the whole environment at once and throws a single
 *   error naming every bad key.
 * - Empty strings count as unset.
 */

import { z } from "zod";

export const SERVICE_NAME = "timetracker";

const zFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const zMs = z.coerce.number().int().min(0);

const zEnv = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    TT_PORT: z.coerce.number().int().min(0).max(65535).default(4010),
    // Validated here; the logger reads LOG_LEVEL itself at import.
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),

    TT_STORE: z.enum(["memory", "mongo"]).default("memory"),
    TT_MONGO_URI: z.string().trim().min(1).optional(),
    TT_SEED: zFlag.default("true"),

    TOKENS_ISSUER: z.string().trim().min(1),
    TOKENS_KEY: z.string().min(16, "must be at least 16 characters"),
    DEMO_TOKENS_ENABLED: zFlag.optional(),

    RATE_LIMIT_ENABLED: zFlag.default("true"),
    RATE_LIMIT_COOLDOWN_MS: zMs.default(5000),
    RATE_LIMIT_STALE_MS: zMs.optional(),
    RATE_LIMIT_SWEEP_MS: z.coerce.number().int().min(100).default(60_000),
    RATE_LIMIT_RESTAMP_ON_REJECT: zFlag.default("true"),
    RATE_LIMIT_PATH_MARKER: z.string().min(1).default("/api/"),

    PAGE_SIZE_DEFAULT: z.coerce.number().int().min(1).default(5),
    PAGE_SIZE_MAX: z.coerce.number().int().min(1).default(100),

    PROBLEM_TYPE_BASE: z
      .string()
      .url()
      .default("https://timetracker.local/errors"),
  })
  .superRefine((e, ctx) => {
    if (e.TT_STORE === "mongo" && !e.TT_MONGO_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TT_MONGO_URI"],
        message: "required when TT_STORE=mongo",
      });
    }
    if (
      e.RATE_LIMIT_STALE_MS !== undefined &&
      e.RATE_LIMIT_STALE_MS < e.RATE_LIMIT_COOLDOWN_MS
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RATE_LIMIT_STALE_MS"],
        message: "must be >= RATE_LIMIT_COOLDOWN_MS",
      });
    }
    if (e.PAGE_SIZE_DEFAULT > e.PAGE_SIZE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PAGE_SIZE_DEFAULT"],
        message: "must be <= PAGE_SIZE_MAX",
      });
    }
  });

export type StoreConfig = { kind: "memory" } | { kind: "mongo"; uri: string };

export type TimeTrackerConfig = Readonly<{
  serviceName: string;
  env: "development" | "test" | "production";
  port: number;
  store: StoreConfig;
  seed: boolean;
  tokens: Readonly<{ issuer: string; key: string; demoEnabled: boolean }>;
  rateLimit: Readonly<{
    enabled: boolean;
    cooldownMs: number;
    staleAfterMs: number;
    sweepIntervalMs: number;
    restampOnReject: boolean;
    pathMarker: string;
  }>;
  paging: Readonly<{ defaultSize: number; maxSize: number }>;
  problemTypeBase: string;
  /** Raw 500 messages reach clients only outside production. */
  exposeErrorDetail: boolean;
}>;

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v;
  }
  return out;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): TimeTrackerConfig {
  const parsed = zEnv.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const lines = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "(env)"}: ${i.message}`
    );
    throw new Error(`Invalid configuration:\n  ${lines.join("\n  ")}`);
  }
  const e = parsed.data;
  const isProd = e.NODE_ENV === "production";

  const store: StoreConfig =
    e.TT_STORE === "mongo" && e.TT_MONGO_URI
      ? { kind: "mongo", uri: e.TT_MONGO_URI }
      : { kind: "memory" };

  return Object.freeze({
    serviceName: SERVICE_NAME,
    env: e.NODE_ENV,
    port: e.TT_PORT,
    store,
    seed: e.TT_SEED,
    tokens: Object.freeze({
      issuer: e.TOKENS_ISSUER,
      key: e.TOKENS_KEY,
      demoEnabled: e.DEMO_TOKENS_ENABLED ?? !isProd,
    }),
    rateLimit: Object.freeze({
      enabled: e.RATE_LIMIT_ENABLED,
      cooldownMs: e.RATE_LIMIT_COOLDOWN_MS,
      staleAfterMs: e.RATE_LIMIT_STALE_MS ?? e.RATE_LIMIT_COOLDOWN_MS,
      sweepIntervalMs: e.RATE_LIMIT_SWEEP_MS,
      restampOnReject: e.RATE_LIMIT_RESTAMP_ON_REJECT,
      pathMarker: e.RATE_LIMIT_PATH_MARKER,
    }),
    paging: Object.freeze({
      defaultSize: e.PAGE_SIZE_DEFAULT,
      maxSize: e.PAGE_SIZE_MAX,
    }),
    problemTypeBase: e.PROBLEM_TYPE_BASE,
    exposeErrorDetail: !isProd,
  });
}
