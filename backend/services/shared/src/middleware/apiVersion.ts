// backend/services/shared/src/middleware/apiVersion.ts

/**
 * Path-segment API versioning: `/api/v{n}/...`.
 *
 * - Unversioned paths are served by the current version.
 * - Every response advertises `api-supported-versions`; deprecated versions
 *   are also listed in `api-deprecated-versions`.
 * - A version outside the supported set is a 404 problem.
 */

import express, { type RequestHandler, type Router } from "express";
import { sendProblem } from "../http/errors";
import type { ProblemFactory } from "../problem/problem";
import { requestIdOf } from "./requestId";

export type ApiVersionPolicy = {
  supported: readonly number[];
  deprecated: readonly number[];
  current: number;
};

export function parseApiVersion(segment: string): number | undefined {
  const m = /^v(\d+)$/i.exec(segment.trim());
  if (!m) return undefined;
  const n = Number(m[1]);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

function advertise(policy: ApiVersionPolicy): RequestHandler {
  const supported = policy.supported.join(", ");
  const deprecated = policy.deprecated.join(", ");
  return (_req, res, next) => {
    res.setHeader("api-supported-versions", supported);
    if (deprecated) res.setHeader("api-deprecated-versions", deprecated);
    next();
  };
}

/**
 * Builds a router that serves `build(version)` both at `/v{n}` for each
 * supported version and at the root for `policy.current`.
 */
export function versionedRouter(
  policy: ApiVersionPolicy,
  problems: ProblemFactory,
  build: (version: number) => Router
): Router {
  if (!policy.supported.includes(policy.current)) {
    throw new Error(`current API version v${policy.current} is not supported`);
  }
  const outer = express.Router();
  outer.use(advertise(policy));

  for (const v of policy.supported) {
    outer.use(`/v${v}`, build(v));
  }

  outer.use("/:version", (req, res, next) => {
    const v = parseApiVersion(req.params.version ?? "");
    if (v === undefined || policy.supported.includes(v)) {
      next();
      return;
    }
    sendProblem(
      res,
      problems.notFound(`API version v${v} is not supported`, requestIdOf(req))
    );
  });

  outer.use(build(policy.current));
  return outer;
}
