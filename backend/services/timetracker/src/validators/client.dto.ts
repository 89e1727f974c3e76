// backend/services/timetracker/src/validators/client.dto.ts
import { z } from "zod";
import { zName } from "./common";

export const zClientInput = z.object({
  name: zName,
});

export type ClientInput = z.infer<typeof zClientInput>;
