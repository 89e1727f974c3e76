// backend/services/timetracker/src/middleware/rateLimit.ts

/**
 * Per-token cooldown for the API surface.
 *
 * - Applies only to paths containing `pathMarker` (default "/api/"), compared
 *   case-insensitively like Express route matching.
 * - Keyed by the raw bearer token; requests without one pass through.
 * - On deny: SECURITY log, `Retry-After` (whole seconds), 429 problem+json.
 */

import type { RequestHandler } from "express";
import type { ProblemFactory } from "@shared/problem/problem";
import { sendProblem } from "@shared/http/errors";
import { requestIdOf } from "@shared/middleware/requestId";
import { logSecurity } from "@shared/utils/securityLog";
import type { AccessLedger } from "../security/accessLedger";
import { bearerTokenOf } from "../security/tokenValidator";

export type TokenRateLimitOptions = {
  ledger: AccessLedger;
  problems: ProblemFactory;
  pathMarker: string;
};

export function tokenRateLimit(opts: TokenRateLimitOptions): RequestHandler {
  const { ledger, problems } = opts;
  const marker = opts.pathMarker.toLowerCase();

  return (req, res, next) => {
    const path = req.originalUrl.split("?")[0];
    if (!path.toLowerCase().includes(marker)) {
      next();
      return;
    }
    const token = bearerTokenOf(req.headers.authorization);
    if (!token) {
      next();
      return;
    }

    const decision = ledger.check(token);
    if (decision.allowed) {
      next();
      return;
    }

    logSecurity(req, {
      kind: "rate_limit",
      reason: "token_cooldown",
      decision: "blocked",
      status: 429,
      route: path,
      method: req.method,
      details: { retryAfterMs: decision.retryAfterMs },
    });
    res.setHeader(
      "Retry-After",
      String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000)))
    );
    sendProblem(res, problems.limitReached(requestIdOf(req)));
  };
}
