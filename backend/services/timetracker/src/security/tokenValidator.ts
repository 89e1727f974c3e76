// backend/services/timetracker/src/security/tokenValidator.ts
import jwt, { type JwtPayload } from "jsonwebtoken";

export const ADMIN_ROLE = "admin";

export type CallerIdentity = {
  /** `sub` claim. */
  name: string;
  /** `jti` claim. */
  tokenId: string;
  isAdmin: boolean;
};

export type TokenFailure = "MissingToken" | "InvalidToken";

export type TokenCheck =
  | { ok: true; identity: CallerIdentity }
  | { ok: false; reason: TokenFailure; detail: string };

export type TokenValidatorOptions = {
  issuer: string;
  key: string;
  /** Epoch milliseconds; injectable for expiry tests. */
  now?: () => number;
};

/** Strips a case-insensitive "Bearer " prefix; undefined when absent or empty. */
export function bearerTokenOf(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const m = /^bearer\s+(\S+)\s*$/i.exec(header.trim());
  return m ? m[1] : undefined;
}

function hasAdminRole(role: unknown): boolean {
  if (typeof role === "string") return role === ADMIN_ROLE;
  if (Array.isArray(role)) return role.some((r) => r === ADMIN_ROLE);
  return false;
}

/**
 * Pure verification: signature (HS256), expiry, issuer and audience.
 * Issuer and audience are the same configured string.
 */
export class TokenValidator {
  private readonly issuer: string;
  private readonly key: string;
  private readonly now: () => number;

  public constructor(opts: TokenValidatorOptions) {
    this.issuer = opts.issuer;
    this.key = opts.key;
    this.now = opts.now ?? Date.now;
  }

  public validate(authorization: string | undefined): TokenCheck {
    const token = bearerTokenOf(authorization);
    if (!token) {
      return {
        ok: false,
        reason: "MissingToken",
        detail: "Missing or malformed Authorization header",
      };
    }
    return this.verify(token);
  }

  public verify(token: string): TokenCheck {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.key, {
        algorithms: ["HS256"],
        issuer: this.issuer,
        audience: this.issuer,
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (err) {
      return {
        ok: false,
        reason: "InvalidToken",
        detail:
          err instanceof jwt.TokenExpiredError
            ? "Token expired"
            : "Invalid token",
      };
    }

    if (typeof payload === "string" || !payload.sub) {
      return { ok: false, reason: "InvalidToken", detail: "Invalid token" };
    }
    const role: unknown = payload["role"];
    return {
      ok: true,
      identity: {
        name: payload.sub,
        tokenId: payload.jti ?? "",
        isAdmin: hasAdminRole(role),
      },
    };
  }
}
