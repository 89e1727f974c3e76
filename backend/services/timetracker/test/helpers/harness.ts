// backend/services/timetracker/test/helpers/harness.ts
import type { Express } from "express";
import { loadConfig, type TimeTrackerConfig } from "../../src/config";
import { createTimeTrackerApp } from "../../src/app";
import { MemoryStoreProvider } from "../../src/store/memoryStore";
import { seedIfEmpty } from "../../src/store/seed";
import type { StoreProvider } from "../../src/store/RecordStore";
import type { AccessLedger } from "../../src/security/accessLedger";
import type { DemoTokenIssuer } from "../../src/security/demoTokenIssuer";

export const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: "test",
  TOKENS_ISSUER: "timetracker-test",
  TOKENS_KEY: "test-secret-0123456789",
  RATE_LIMIT_ENABLED: "false",
  PROBLEM_TYPE_BASE: "https://timetracker.test/errors",
};

export const START = Date.UTC(2024, 0, 15, 9, 0, 0);

export class TestClock {
  public t = START;
  public readonly now = () => this.t;
  public advance(ms: number): void {
    this.t += ms;
  }
}

export type Harness = {
  app: Express;
  config: TimeTrackerConfig;
  provider: StoreProvider;
  ledger: AccessLedger;
  issuer: DemoTokenIssuer;
  clock: TestClock;
  admin: string;
  reader: string;
};

export async function buildHarness(
  opts: {
    env?: NodeJS.ProcessEnv;
    seed?: boolean;
    provider?: StoreProvider;
  } = {}
): Promise<Harness> {
  const config = loadConfig({ ...TEST_ENV, ...opts.env });
  const provider = opts.provider ?? new MemoryStoreProvider();
  if (opts.seed) await seedIfEmpty(provider);
  const clock = new TestClock();
  const { app, ledger, issuer } = createTimeTrackerApp({
    config,
    provider,
    now: clock.now,
  });
  return {
    app,
    config,
    provider,
    ledger,
    issuer,
    clock,
    admin: `Bearer ${issuer.issue("test-admin", true)}`,
    reader: `Bearer ${issuer.issue("test-reader", false)}`,
  };
}
