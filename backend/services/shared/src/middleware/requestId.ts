// backend/services/shared/src/middleware/requestId.ts

/**
 * Request ID middleware.
 *
 * - Must run before the http logger and every guard so all records carry `req.id`.
 * - Never overwrites a caller-supplied id; mints a UUID only when the request
 *   has none of `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 * - Echoes the id in `x-request-id`.
 */

import type { IncomingMessage } from "node:http";
import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

const HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"] as const;

function headerId(req: IncomingMessage): string | undefined {
  for (const name of HEADERS) {
    const raw = req.headers[name];
    const v = Array.isArray(raw) ? raw[0] : raw;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = headerId(req) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}

/** The correlation id for problem bodies and security records. */
export function requestIdOf(req: IncomingMessage): string {
  const id: unknown = req.id;
  if (typeof id === "string" && id) return id;
  if (typeof id === "number") return String(id);
  return headerId(req) ?? "";
}
