// backend/services/timetracker/src/validators/token.dto.ts
import { z } from "zod";
import { zName } from "./common";

export const DEMO_TOKEN_NAME = "timetracker-demo";

export const zTokenQuery = z.object({
  name: zName.default(DEMO_TOKEN_NAME),
  admin: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false"]))
    .default("false")
    .transform((v) => v === "true"),
});
