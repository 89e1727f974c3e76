// backend/services/shared/src/contracts/problem.ts
import { z } from "zod";

/** RFC 7807 Problem+JSON as it appears on the wire. */
export const zProblem = z.object({
  type: z.string(),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  errors: z
    .array(
      z.object({ path: z.string(), code: z.string(), message: z.string() })
    )
    .optional(),
});

export type ProblemBody = z.infer<typeof zProblem>;
