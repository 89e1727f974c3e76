// backend/services/timetracker/index.ts

/**
 * Start-up: load env (bootstrap), validate config, open the store, seed,
 * then serve. SIGINT/SIGTERM closes the server and the store.
 */

import "./src/bootstrap";

import { logger } from "@shared/logger/logger";
import {
  onShutdownSignal,
  startHttpService,
} from "@shared/bootstrap/startHttpService";
import { loadConfig, SERVICE_NAME } from "./src/config";
import { createTimeTrackerApp } from "./src/app";
import { openStore } from "./src/storeFactory";
import { seedIfEmpty } from "./src/store/seed";
import { loadedEnvFiles } from "./src/bootstrap";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});

async function start(): Promise<void> {
  const config = loadConfig();
  logger.info(
    { envFiles: loadedEnvFiles, store: config.store.kind, env: config.env },
    `[${SERVICE_NAME}] config loaded`
  );

  const provider = await openStore(config.store);
  if (config.seed) await seedIfEmpty(provider);

  const { app, ledger } = createTimeTrackerApp({ config, provider });
  const stopSweeper = ledger.startSweeper();
  const http = await startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
  });

  onShutdownSignal(SERVICE_NAME, async () => {
    stopSweeper();
    await http.stop();
    await provider.close();
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, `[${SERVICE_NAME}] failed to start`);
  process.exit(1);
});
