// backend/services/shared/src/problem/problem.ts

/**
 * Transport-agnostic Problem primitives (RFC 7807).
 *
 * Invariants:
 * - No Express imports, no process.env access.
 * - `type` is always `${typeBase}/${slug}` so clients can switch on the suffix.
 */

import type { ZodError } from "zod";

export type ProblemFieldError = {
  path: string;
  code: string;
  message: string;
};

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  errors?: ProblemFieldError[];
};

export type ProblemSlug =
  | "bad-request"
  | "validation-failed"
  | "not-found"
  | "unauthenticated"
  | "forbidden"
  | "limit-reached"
  | "internal";

export const OPAQUE_INTERNAL_DETAIL = "An unexpected error occurred.";

/**
 * Thrown (or passed to next()) by code that wants a specific problem on the
 * wire. Anything else reaching the error boundary becomes a 500.
 */
export class ProblemError extends Error {
  public readonly problem: ProblemJson;

  public constructor(problem: ProblemJson) {
    super(problem.detail ?? problem.title);
    this.name = "ProblemError";
    this.problem = problem;
  }

  public get status(): number {
    return this.problem.status;
  }
}

export class ProblemFactory {
  private readonly typeBase: string;
  private readonly exposeInternalDetail: boolean;

  public constructor(opts: { typeBase: string; exposeInternalDetail: boolean }) {
    const base = opts.typeBase.trim().replace(/\/+$/, "");
    if (!base) {
      throw new Error("ProblemFactory: typeBase is required");
    }
    this.typeBase = base;
    this.exposeInternalDetail = opts.exposeInternalDetail;
  }

  public typeOf(slug: ProblemSlug): string {
    return `${this.typeBase}/${slug}`;
  }

  public badRequest(detail: string, instance?: string): ProblemJson {
    return {
      type: this.typeOf("bad-request"),
      title: "Bad Request",
      status: 400,
      detail,
      instance,
    };
  }

  public validationFailed(
    errors: ProblemFieldError[],
    instance?: string
  ): ProblemJson {
    return {
      type: this.typeOf("validation-failed"),
      title: "Bad Request",
      status: 400,
      detail: "Validation failed",
      instance,
      errors,
    };
  }

  public fromZod(error: ZodError, instance?: string): ProblemJson {
    return this.validationFailed(fieldErrorsOf(error), instance);
  }

  public notFound(detail: string, instance?: string): ProblemJson {
    return {
      type: this.typeOf("not-found"),
      title: "Not Found",
      status: 404,
      detail,
      instance,
    };
  }

  public unauthenticated(detail: string, instance?: string): ProblemJson {
    return {
      type: this.typeOf("unauthenticated"),
      title: "Unauthorized",
      status: 401,
      detail,
      instance,
    };
  }

  public forbidden(detail: string, instance?: string): ProblemJson {
    return {
      type: this.typeOf("forbidden"),
      title: "Forbidden",
      status: 403,
      detail,
      instance,
    };
  }

  public limitReached(instance?: string): ProblemJson {
    return {
      type: this.typeOf("limit-reached"),
      title: "Limit reached",
      status: 429,
      detail: "Token limit reached, operation cancelled",
      instance,
    };
  }

  /** Raw messages cross the boundary only when the factory was built to expose them. */
  public internalError(cause: unknown, instance?: string): ProblemJson {
    const message = cause instanceof Error ? cause.message : String(cause);
    return {
      type: this.typeOf("internal"),
      title: "Internal Server Error",
      status: 500,
      detail:
        this.exposeInternalDetail && message
          ? message
          : OPAQUE_INTERNAL_DETAIL,
      instance,
    };
  }
}

export function fieldErrorsOf(error: ZodError): ProblemFieldError[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}
