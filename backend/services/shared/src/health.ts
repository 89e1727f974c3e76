// backend/services/shared/src/health.ts
import express from "express";
import { requestIdOf } from "./middleware/requestId";

/** Resolves when dependencies are reachable; rejects (or throws) otherwise. */
export type ReadinessFn = () => Promise<Record<string, unknown>>;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
  /** Injectable for tests. */
  uptimeSeconds?: () => number;
};

/**
 * Exposes:
 *   GET /health        -> summary (service, status, uptime)
 *   GET /health/live   -> liveness, always 200
 *   GET /health/ready  -> readiness, 503 when `readiness` fails
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();
  const uptime = opts.uptimeSeconds ?? (() => Math.round(process.uptime()));

  const base = {
    service: opts.service,
    env: opts.env,
    version: opts.version,
  };

  router.get("/health", (req, res) => {
    res.json({
      ...base,
      status: "ok",
      uptimeSeconds: uptime(),
      instance: requestIdOf(req),
    });
  });

  router.get("/health/live", (req, res) => {
    res.json({ ...base, ok: true, instance: requestIdOf(req) });
  });

  router.get("/health/ready", async (req, res) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, instance: requestIdOf(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return router;
}
