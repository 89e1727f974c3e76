// backend/services/timetracker/src/contracts/views.ts

/**
 * Wire shapes (view models) for responses. Controllers validate outgoing
 * payloads against these, and tests parse responses with them.
 */

import { z } from "zod";

const zId = z.number().int();

export const zUserView = z.object({
  id: zId,
  name: z.string(),
  hourRate: z.number(),
});

export const zClientView = z.object({
  id: zId,
  name: z.string(),
});

export const zProjectView = z.object({
  id: zId,
  name: z.string(),
  clientId: zId,
  clientName: z.string(),
});

export const zTimeEntryView = z.object({
  id: zId,
  userId: zId,
  userName: z.string(),
  projectId: zId,
  projectName: z.string(),
  clientId: zId,
  clientName: z.string(),
  /** YYYY-MM-DD */
  entryDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  hours: z.number().int(),
  hourRate: z.number(),
  description: z.string(),
});

export const zPaged = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    items: z.array(item),
    page: z.number().int(),
    pageSize: z.number().int(),
    totalCount: z.number().int().min(0),
    totalPages: z.number().int().min(0),
  });

export type UserView = z.infer<typeof zUserView>;
export type ClientView = z.infer<typeof zClientView>;
export type ProjectView = z.infer<typeof zProjectView>;
export type TimeEntryView = z.infer<typeof zTimeEntryView>;
