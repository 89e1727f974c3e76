// backend/services/timetracker/src/middleware/requireAdmin.ts
import type { RequestHandler } from "express";
import type { ProblemFactory } from "@shared/problem/problem";
import { sendProblem } from "@shared/http/errors";
import { requestIdOf } from "@shared/middleware/requestId";
import { logSecurity } from "@shared/utils/securityLog";

/**
 * Role gate for mutating routes. Mount after `authenticate`; runs before body
 * validation, so a non-admin caller gets 403 whatever the payload.
 */
export function requireAdmin(problems: ProblemFactory): RequestHandler {
  return (req, res, next) => {
    const identity = req.identity;
    if (identity?.isAdmin) {
      next();
      return;
    }

    const status = identity ? 403 : 401;
    logSecurity(req, {
      kind: "role",
      reason: identity ? "admin_role_required" : "unauthenticated",
      decision: "blocked",
      status,
      route: req.originalUrl.split("?")[0],
      method: req.method,
    });
    const instance = requestIdOf(req);
    sendProblem(
      res,
      identity
        ? problems.forbidden("Admin role required", instance)
        : problems.unauthenticated("Authentication required", instance)
    );
  };
}
