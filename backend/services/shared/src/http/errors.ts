// backend/services/shared/src/http/errors.ts
import type { Response } from "express";
import type { ProblemJson } from "../problem/problem";

/** Drop undefined members so the wire body has no `"instance": undefined` holes. */
export function clean(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) if (v !== undefined) out[k] = v;
  return out;
}

export function sendProblem(res: Response, problem: ProblemJson): Response {
  return res
    .status(problem.status)
    .type("application/problem+json")
    .json(clean(problem));
}
