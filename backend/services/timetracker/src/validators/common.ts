// backend/services/timetracker/src/validators/common.ts
import { z } from "zod";

export const NAME_MAX = 100;
export const DESCRIPTION_MAX = 10_000;

/** Non-blank after trimming, 1..100 chars. */
export const zName = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .max(NAME_MAX, `must be at most ${NAME_MAX} characters`);

/** Reference to another entity; 0 means "not set". */
export const zRefId = z
  .number()
  .int()
  .refine((v) => v !== 0, "must not be 0");

/**
 * Path id segment. Digits only (400 otherwise); a value no entity can have,
 * such as 0, parses and later resolves to 404.
 */
export const zPathId = z
  .string()
  .regex(/^-?\d+$/, "must be an integer")
  .transform(Number)
  .pipe(z.number().refine(Number.isSafeInteger, "out of range"));

export const zIdParams = z.object({ id: zPathId });

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:T[\d:.]+(?:Z|[+-]\d{2}:\d{2})?)?$/;

/** Calendar date (time part, if any, is dropped) at UTC midnight. */
export function parseCalendarDate(raw: string): Date | null {
  const m = DATE_RE.exec(raw.trim());
  if (!m) return null;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(y, mo - 1, d));
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d
  ) {
    return null;
  }
  return date;
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export const zCalendarDate = z.string().transform((raw, ctx) => {
  const date = parseCalendarDate(raw);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be a calendar date (YYYY-MM-DD)",
    });
    return z.NEVER;
  }
  return date;
});
