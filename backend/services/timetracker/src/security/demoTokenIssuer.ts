// backend/services/timetracker/src/security/demoTokenIssuer.ts

/**
 * DEMO ONLY. Signs a token for any caller-supplied name and admin flag, with
 * a one-year lifetime and no revocation. A stand-in for a real identity
 * provider; keep DEMO_TOKENS_ENABLED off in production.
 */

import jwt, { type JwtPayload } from "jsonwebtoken";
import { randomUUID } from "node:crypto";
import { ADMIN_ROLE } from "./tokenValidator";

export const DEMO_TOKEN_LIFETIME_SECONDS = 365 * 24 * 60 * 60;

export type DemoTokenIssuerOptions = {
  issuer: string;
  key: string;
  lifetimeSeconds?: number;
  now?: () => number;
  newId?: () => string;
};

export class DemoTokenIssuer {
  private readonly opts: Required<DemoTokenIssuerOptions>;

  public constructor(opts: DemoTokenIssuerOptions) {
    this.opts = {
      issuer: opts.issuer,
      key: opts.key,
      lifetimeSeconds: opts.lifetimeSeconds ?? DEMO_TOKEN_LIFETIME_SECONDS,
      now: opts.now ?? Date.now,
      newId: opts.newId ?? randomUUID,
    };
  }

  public issue(name: string, isAdmin: boolean): string {
    const { issuer, key, lifetimeSeconds, now, newId } = this.opts;
    const claims: JwtPayload = { iat: Math.floor(now() / 1000) };
    if (isAdmin) claims.role = ADMIN_ROLE;
    return jwt.sign(claims, key, {
      algorithm: "HS256",
      subject: name,
      jwtid: newId(),
      issuer,
      audience: issuer,
      expiresIn: lifetimeSeconds,
    });
  }
}
