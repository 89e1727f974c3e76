// backend/services/timetracker/test/accessLedger.spec.ts
import { describe, it, expect } from "vitest";
import { AccessLedger } from "../src/security/accessLedger";

function ledgerAt(opts: {
  restampOnReject?: boolean;
  staleAfterMs?: number;
  sweepIntervalMs?: number;
} = {}) {
  const clock = { t: 0 };
  const ledger = new AccessLedger({
    cooldownMs: 5000,
    now: () => clock.t,
    sweepIntervalMs: 3_600_000,
    ...opts,
  });
  return { ledger, clock };
}

describe("AccessLedger cooldown boundary", () => {
  it("rejects a second request 4.999s later", () => {
    const { ledger, clock } = ledgerAt();
    expect(ledger.check("tok").allowed).toBe(true);
    clock.t = 4999;
    expect(ledger.check("tok")).toEqual({ allowed: false, retryAfterMs: 5000 });
  });

  it("allows a second request exactly 5.000s later", () => {
    const { ledger, clock } = ledgerAt();
    expect(ledger.check("tok").allowed).toBe(true);
    clock.t = 5000;
    expect(ledger.check("tok").allowed).toBe(true);
  });

  it("tracks tokens independently", () => {
    const { ledger } = ledgerAt();
    expect(ledger.check("a").allowed).toBe(true);
    expect(ledger.check("b").allowed).toBe(true);
    expect(ledger.check("a").allowed).toBe(false);
  });
});

describe("AccessLedger restamp on reject", () => {
  it("extends the lockout while the client keeps retrying (default)", () => {
    const { ledger, clock } = ledgerAt();
    ledger.check("tok");
    clock.t = 3000;
    expect(ledger.check("tok").allowed).toBe(false);
    clock.t = 6000; // 6s after the allowed call, 3s after the rejected one
    expect(ledger.check("tok").allowed).toBe(false);
    clock.t = 11_000;
    expect(ledger.check("tok").allowed).toBe(true);
  });

  it("ends the lockout cooldown after the last allowed call when disabled", () => {
    const { ledger, clock } = ledgerAt({ restampOnReject: false });
    ledger.check("tok");
    clock.t = 3000;
    expect(ledger.check("tok")).toEqual({ allowed: false, retryAfterMs: 2000 });
    clock.t = 5000;
    expect(ledger.check("tok").allowed).toBe(true);
  });
});

describe("AccessLedger concurrency", () => {
  it("lets exactly one of a burst of simultaneous requests through", async () => {
    const { ledger } = ledgerAt();
    const decisions = await Promise.all(
      Array.from({ length: 25 }, () =>
        Promise.resolve().then(() => ledger.check("burst"))
      )
    );
    expect(decisions.filter((d) => d.allowed)).toHaveLength(1);
  });
});

describe("AccessLedger eviction", () => {
  it("sweep drops only entries idle for staleAfterMs", () => {
    const { ledger, clock } = ledgerAt({ staleAfterMs: 10_000 });
    ledger.check("old");
    clock.t = 6000;
    ledger.check("recent");
    expect(ledger.sweep(10_000)).toBe(1);
    expect(ledger.size).toBe(1);
  });

  it("sweeps opportunistically from check()", () => {
    const { ledger, clock } = ledgerAt({ sweepIntervalMs: 1000 });
    ledger.check("a");
    clock.t = 6000;
    ledger.check("b");
    expect(ledger.size).toBe(1);
  });

  it("treats an evicted token as unseen", () => {
    const { ledger, clock } = ledgerAt();
    ledger.check("tok");
    clock.t = 5000;
    ledger.sweep();
    expect(ledger.size).toBe(0);
    expect(ledger.check("tok").allowed).toBe(true);
  });

  it("refuses a stale window shorter than the cooldown", () => {
    expect(
      () => new AccessLedger({ cooldownMs: 5000, staleAfterMs: 4000 })
    ).toThrow(RangeError);
  });
});
