// backend/services/timetracker/src/app.ts

/**
 * Assembles the time-tracking service on the shared app builder.
 *
 * Request path under /api:
 *   authenticate (401) → per-token cooldown (429) → version dispatch →
 *   admin gate on writes (403) → validation (400) → resource service
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import { versionedRouter, type ApiVersionPolicy } from "@shared/middleware/apiVersion";
import { ProblemFactory } from "@shared/problem/problem";
import { logger } from "@shared/logger/logger";
import type { TimeTrackerConfig } from "./config";
import type { StoreProvider } from "./store/RecordStore";
import { TokenValidator } from "./security/tokenValidator";
import { DemoTokenIssuer } from "./security/demoTokenIssuer";
import { AccessLedger } from "./security/accessLedger";
import { authenticate } from "./middleware/authenticate";
import { requireAdmin } from "./middleware/requireAdmin";
import { tokenRateLimit } from "./middleware/rateLimit";
import { ResourceService } from "./services/resourceService";
import { userResource } from "./services/users";
import { clientResource } from "./services/clients";
import { projectResource } from "./services/projects";
import { timeEntryResource } from "./services/timeEntries";
import { makeResourceController } from "./controllers/resourceController";
import { makeMonthHandler } from "./controllers/timeEntries";
import { makeGetTokenHandler } from "./controllers/tokens";
import { apiRoutes } from "./routes";
import { zUserInput } from "./validators/user.dto";
import { zClientInput } from "./validators/client.dto";
import { zProjectInput } from "./validators/project.dto";
import { zTimeEntryInput } from "./validators/timeEntry.dto";
import {
  zClientView,
  zProjectView,
  zTimeEntryView,
  zUserView,
} from "./contracts/views";

export const API_VERSIONS: ApiVersionPolicy = {
  supported: [1, 2],
  deprecated: [1],
  current: 2,
};

export type TimeTrackerDeps = {
  config: TimeTrackerConfig;
  provider: StoreProvider;
  /** Epoch milliseconds; shared by the token validator, issuer and ledger. */
  now?: () => number;
};

export type TimeTrackerApp = {
  app: Express;
  ledger: AccessLedger;
  issuer: DemoTokenIssuer;
};

export function createTimeTrackerApp(deps: TimeTrackerDeps): TimeTrackerApp {
  const { config, provider } = deps;
  const now = deps.now ?? Date.now;

  const problems = new ProblemFactory({
    typeBase: config.problemTypeBase,
    exposeInternalDetail: config.exposeErrorDetail,
  });
  const validator = new TokenValidator({ ...config.tokens, now });
  const issuer = new DemoTokenIssuer({ ...config.tokens, now });
  const ledger = new AccessLedger({
    cooldownMs: config.rateLimit.cooldownMs,
    restampOnReject: config.rateLimit.restampOnReject,
    staleAfterMs: config.rateLimit.staleAfterMs,
    sweepIntervalMs: config.rateLimit.sweepIntervalMs,
    now,
  });

  const paging = config.paging;
  const controllers = {
    users: makeResourceController({
      service: new ResourceService(provider, userResource),
      input: zUserInput,
      view: zUserView,
      problems,
      paging,
    }),
    clients: makeResourceController({
      service: new ResourceService(provider, clientResource),
      input: zClientInput,
      view: zClientView,
      problems,
      paging,
    }),
    projects: makeResourceController({
      service: new ResourceService(provider, projectResource),
      input: zProjectInput,
      view: zProjectView,
      problems,
      paging,
    }),
    timeEntries: makeResourceController({
      service: new ResourceService(provider, timeEntryResource),
      input: zTimeEntryInput,
      view: zTimeEntryView,
      problems,
      paging,
    }),
    timeEntriesForMonth: makeMonthHandler(provider, problems),
  };
  const adminOnly = requireAdmin(problems);

  const guards = [authenticate(validator, problems)];
  if (config.rateLimit.enabled) {
    guards.push(
      tokenRateLimit({
        ledger,
        problems,
        pathMarker: config.rateLimit.pathMarker,
      })
    );
  }

  const app = createServiceApp({
    serviceName: config.serviceName,
    apiPrefix: "/api",
    problems,
    env: config.env,
    guards,
    readiness: async () => {
      await provider.ping();
      return { store: provider.kind };
    },
    mountPublic: (root) => {
      if (!config.tokens.demoEnabled) return;
      logger.warn(
        { route: "/get-token" },
        "demo token issuance enabled: NOT FOR PRODUCTION"
      );
      root.get("/get-token", makeGetTokenHandler(issuer, problems));
    },
    mountRoutes: (api) => {
      api.use(
        versionedRouter(API_VERSIONS, problems, (version) =>
          apiRoutes(controllers, adminOnly, version)
        )
      );
    },
  });

  return { app, ledger, issuer };
}
