// backend/services/timetracker/src/security/accessLedger.ts

/**
 * Per-token cooldown gate: a token may be used at most once per `cooldownMs`.
 *
 * `check()` reads and writes `lastSeen` without yielding, so on Node's single
 * event loop two near-simultaneous requests for one token cannot both pass.
 * State is process-local: separate instances behind a load balancer do not
 * share it.
 *
 * restampOnReject:
 *   true  - a rejected request also moves `lastSeen` to now, so a client that
 *           keeps retrying extends its own lockout.
 *   false - only allowed requests stamp; lockout ends `cooldownMs` after the
 *           last allowed request.
 *
 * Entries idle for `staleAfterMs` (≥ cooldown) are evicted; such an entry
 * would be allowed anyway, so eviction never changes a decision.
 */

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

export type AccessLedgerOptions = {
  cooldownMs: number;
  restampOnReject?: boolean;
  staleAfterMs?: number;
  /** Minimum spacing of opportunistic sweeps run from `check()`. */
  sweepIntervalMs?: number;
  now?: () => number;
};

export class AccessLedger {
  private readonly lastSeen = new Map<string, number>();
  private readonly cooldownMs: number;
  private readonly restampOnReject: boolean;
  private readonly staleAfterMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private lastSweep: number;

  public constructor(opts: AccessLedgerOptions) {
    if (!Number.isFinite(opts.cooldownMs) || opts.cooldownMs < 0) {
      throw new RangeError(`cooldownMs must be >= 0, got ${opts.cooldownMs}`);
    }
    const staleAfterMs = opts.staleAfterMs ?? opts.cooldownMs;
    if (staleAfterMs < opts.cooldownMs) {
      throw new RangeError("staleAfterMs must be >= cooldownMs");
    }
    this.cooldownMs = opts.cooldownMs;
    this.restampOnReject = opts.restampOnReject ?? true;
    this.staleAfterMs = staleAfterMs;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? 60_000;
    this.now = opts.now ?? Date.now;
    this.lastSweep = this.now();
  }

  public check(token: string): AccessDecision {
    const now = this.now();
    if (now - this.lastSweep >= this.sweepIntervalMs) this.sweep(now);

    const prev = this.lastSeen.get(token);
    if (prev === undefined || now - prev >= this.cooldownMs) {
      this.lastSeen.set(token, now);
      return { allowed: true };
    }

    if (this.restampOnReject) {
      this.lastSeen.set(token, now);
      return { allowed: false, retryAfterMs: this.cooldownMs };
    }
    return { allowed: false, retryAfterMs: prev + this.cooldownMs - now };
  }

  /** Drops entries idle for at least `staleAfterMs`; returns how many. */
  public sweep(now: number = this.now()): number {
    this.lastSweep = now;
    let removed = 0;
    for (const [token, seen] of this.lastSeen) {
      if (now - seen >= this.staleAfterMs) {
        this.lastSeen.delete(token);
        removed++;
      }
    }
    return removed;
  }

  public get size(): number {
    return this.lastSeen.size;
  }

  /** Periodic sweep for idle processes; returns the stop function. */
  public startSweeper(): () => void {
    const timer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
