// backend/services/timetracker/src/middleware/authenticate.ts
import type { RequestHandler } from "express";
import type { ProblemFactory } from "@shared/problem/problem";
import { sendProblem } from "@shared/http/errors";
import { requestIdOf } from "@shared/middleware/requestId";
import { logSecurity } from "@shared/utils/securityLog";
import type {
  CallerIdentity,
  TokenValidator,
} from "../security/tokenValidator";

/** Module augmentation: the verified caller rides on the request. */
declare module "express-serve-static-core" {
  interface Request {
    identity?: CallerIdentity;
  }
}

/** Every request it guards needs a valid, unexpired bearer token (401 otherwise). */
export function authenticate(
  validator: TokenValidator,
  problems: ProblemFactory
): RequestHandler {
  return (req, res, next) => {
    const check = validator.validate(req.headers.authorization);
    if (check.ok) {
      req.identity = check.identity;
      next();
      return;
    }

    logSecurity(req, {
      kind: "auth",
      reason: check.reason,
      decision: "blocked",
      status: 401,
      route: req.originalUrl.split("?")[0],
      method: req.method,
    });
    res.setHeader(
      "WWW-Authenticate",
      check.reason === "InvalidToken" ? 'Bearer error="invalid_token"' : "Bearer"
    );
    sendProblem(res, problems.unauthenticated(check.detail, requestIdOf(req)));
  };
}
