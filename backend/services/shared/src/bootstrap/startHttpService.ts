// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Bind an Express app, log where it landed, and offer an orderly stop.
 * Never loads env; callers do that first.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { logger } from "../logger/logger";

export interface StartHttpServiceOptions {
  app: Express;
  /** 0 picks an ephemeral port. */
  port: number;
  serviceName: string;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    // headersTimeout must stay above keepAliveTimeout
    server.keepAliveTimeout = 7_000;
    server.headersTimeout = 9_000;

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      server.on("error", (err) => {
        logger.error({ err, service: serviceName }, "http server error");
      });

      const addr: AddressInfo | string | null = server.address();
      const boundPort = typeof addr === "object" && addr ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");

      const stop = () =>
        new Promise<void>((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        });
      resolve({ server, boundPort, stop });
    });
  });
}

/** Runs `shutdown` once on the first SIGINT/SIGTERM, then exits. */
export function onShutdownSignal(
  serviceName: string,
  shutdown: () => Promise<void>
): void {
  let stopping = false;
  const handle = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ service: serviceName, signal }, "shutting down");
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", handle);
  process.once("SIGTERM", handle);
}
