// backend/services/timetracker/src/validators/timeEntry.dto.ts
import { z } from "zod";
import { DESCRIPTION_MAX, zCalendarDate, zPathId, zRefId } from "./common";

/** Entries must fall strictly inside this window. */
export const ENTRY_DATE_AFTER = new Date(Date.UTC(2019, 0, 1));
export const ENTRY_DATE_BEFORE = new Date(Date.UTC(2100, 0, 1));

export const zTimeEntryInput = z.object({
  userId: zRefId,
  projectId: zRefId,
  entryDate: zCalendarDate.pipe(
    z
      .date()
      .refine(
        (d) =>
          d.getTime() > ENTRY_DATE_AFTER.getTime() &&
          d.getTime() < ENTRY_DATE_BEFORE.getTime(),
        "must be after 2019-01-01 and before 2100-01-01"
      )
  ),
  hours: z.number().int().min(1).max(24),
  description: z
    .string()
    .trim()
    .min(1, "must not be empty")
    .max(DESCRIPTION_MAX, `must be at most ${DESCRIPTION_MAX} characters`),
});

export type TimeEntryInput = z.infer<typeof zTimeEntryInput>;

export const zMonthParams = z.object({
  userId: zPathId,
  year: z.coerce.number().int().min(1).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

export type MonthParams = z.infer<typeof zMonthParams>;
