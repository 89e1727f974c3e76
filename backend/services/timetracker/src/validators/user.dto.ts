// backend/services/timetracker/src/validators/user.dto.ts
import { z } from "zod";
import { zName } from "./common";

export const zUserInput = z.object({
  name: zName,
  /** Exclusive bounds. */
  hourRate: z
    .number()
    .gt(0, "must be greater than 0")
    .lt(1000, "must be less than 1000"),
});

export type UserInput = z.infer<typeof zUserInput>;
