// backend/services/shared/src/app/createServiceApp.ts

/**
 * Shared Express app builder.
 *
 * Stack order:
 *   requestId → http logger → health → cors → json parser → public routes →
 *   apiPrefix: guards → routes → 404 → error boundary
 *
 * Health and public routes sit outside `apiPrefix`, so API guards never see them.
 */

import express, {
  type Express,
  type RequestHandler,
  type Router,
} from "express";
import cors from "cors";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";
import type { ProblemFactory } from "../problem/problem";

export type CreateServiceAppOptions = {
  serviceName: string;
  /** API base path, e.g. "/api". */
  apiPrefix: string;
  problems: ProblemFactory;
  mountRoutes: (router: Router) => void;
  /** Run in order on every request under `apiPrefix`, before any route. */
  guards?: RequestHandler[];
  /** Unauthenticated routes mounted at the app root. */
  mountPublic?: (app: Express) => void;
  readiness?: ReadinessFn;
  env?: string;
  jsonLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, problems } = opts;

  const app = express();
  app.disable("x-powered-by");

  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  app.use(
    createHealthRouter({
      service: serviceName,
      env: opts.env,
      readiness: opts.readiness,
    })
  );

  app.use(cors({ exposedHeaders: ["location", "x-request-id", "retry-after"] }));
  app.use(express.json({ limit: opts.jsonLimit ?? "1mb" }));

  opts.mountPublic?.(app);

  const api = express.Router();
  for (const guard of opts.guards ?? []) api.use(guard);
  opts.mountRoutes(api);
  app.use(apiPrefix, api);

  app.use(notFoundProblemJson(problems));
  app.use(errorProblemJson(problems));

  return app;
}
