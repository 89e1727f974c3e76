// backend/services/shared/src/utils/securityLog.ts

/**
 * Security telemetry for guard decisions (auth gate, role gate, rate limit).
 *
 * - One `warn` record per decision, shaped consistently for dashboards.
 * - Never carries the bearer token or any other credential.
 * - Must never throw into the request path.
 */

import type { Request } from "express";
import { currentServiceName, logger } from "../logger/logger";
import { requestIdOf } from "../middleware/requestId";

export type SecurityLogDetails = {
  kind: "auth" | "role" | "rate_limit";
  reason: string;
  decision: "blocked" | "allow";
  status: number;
  route: string;
  method: string;
  ip?: string;
  details?: Record<string, unknown>;
};

export function clientIpOf(req: Request): string | undefined {
  const fwd = req.headers["x-forwarded-for"];
  const first = (Array.isArray(fwd) ? fwd[0] : fwd)?.split(",")[0]?.trim();
  return first || req.socket.remoteAddress || undefined;
}

export function logSecurity(req: Request, entry: SecurityLogDetails): void {
  try {
    logger.warn(
      {
        ch: "SECURITY",
        service: currentServiceName(),
        requestId: requestIdOf(req),
        ...entry,
        ip: entry.ip ?? clientIpOf(req),
      },
      "security guardrail decision"
    );
  } catch (err) {
    // A failing sink must not turn a 401/403/429 into a 500.
    process.stderr.write(`securityLog failed: ${String(err)}\n`);
  }
}
