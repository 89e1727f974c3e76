// backend/services/timetracker/src/validators/project.dto.ts
import { z } from "zod";
import { zName, zRefId } from "./common";

export const zProjectInput = z.object({
  name: zName,
  clientId: zRefId,
});

export type ProjectInput = z.infer<typeof zProjectInput>;
