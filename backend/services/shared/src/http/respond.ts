// backend/services/shared/src/http/respond.ts
import type { Response } from "express";
import type { z } from "zod";

/** Validate an outgoing payload against its wire schema, then send it. */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: z.input<T>,
  status = 200
): Response {
  return res.status(status).json(schema.parse(payload));
}
