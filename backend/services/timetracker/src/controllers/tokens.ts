// backend/services/timetracker/src/controllers/tokens.ts
import type { RequestHandler } from "express";
import { requestIdOf } from "@shared/middleware/requestId";
import { sendProblem } from "@shared/http/errors";
import { logger } from "@shared/logger/logger";
import type { ProblemFactory } from "@shared/problem/problem";
import type { DemoTokenIssuer } from "../security/demoTokenIssuer";
import { zTokenQuery } from "../validators/token.dto";

/** GET /get-token?name=&admin=: demo issuance, raw token as text/plain. Both parameters are optional. */
export function makeGetTokenHandler(
  issuer: DemoTokenIssuer,
  problems: ProblemFactory
): RequestHandler {
  return (req, res) => {
    const parsed = zTokenQuery.safeParse(req.query);
    if (!parsed.success) {
      sendProblem(res, problems.fromZod(parsed.error, requestIdOf(req)));
      return;
    }
    const { name, admin } = parsed.data;
    logger.info({ name, admin }, "demo token issued");
    res.type("text/plain").send(issuer.issue(name, admin));
  };
}
