// backend/services/timetracker/src/services/timeEntries.ts
import {
  UNASSIGNED_ID,
  type ProjectRecord,
  type StoreProvider,
  type TimeEntryRecord,
  type UserRecord,
} from "../store/RecordStore";
import type {
  MonthParams,
  TimeEntryInput,
} from "../validators/timeEntry.dto";
import { formatCalendarDate } from "../validators/common";
import type { TimeEntryView } from "../contracts/views";
import { ProjectionContext } from "./projection";
import type { ResourceDefinition } from "./resourceService";

type TimeEntryRefs = { user: UserRecord; project: ProjectRecord };

async function toView(
  e: TimeEntryRecord,
  ctx: ProjectionContext
): Promise<TimeEntryView> {
  const [user, project] = await Promise.all([
    ctx.user(e.userId),
    ctx.project(e.projectId),
  ]);
  const client = await ctx.client(project.clientId);
  return {
    id: e.id,
    userId: user.id,
    userName: user.name,
    projectId: project.id,
    projectName: project.name,
    clientId: client.id,
    clientName: client.name,
    entryDate: formatCalendarDate(e.entryDate),
    hours: e.hours,
    hourRate: e.hourRate,
    description: e.description,
  };
}

export const timeEntryResource: ResourceDefinition<
  TimeEntryRecord,
  TimeEntryInput,
  TimeEntryView,
  TimeEntryRefs
> = {
  label: "TimeEntry",
  set: (store) => store.timeEntries,
  resolve: async (store, input) => {
    const [user, project] = await Promise.all([
      store.users.find(input.userId),
      store.projects.find(input.projectId),
    ]);
    if (!user) return { ok: false, detail: `User ${input.userId} not found` };
    if (!project) {
      return { ok: false, detail: `Project ${input.projectId} not found` };
    }
    return { ok: true, refs: { user, project } };
  },
  // hourRate is the user's rate at booking time and never follows later changes.
  create: (input, { user, project }) => ({
    id: UNASSIGNED_ID,
    userId: user.id,
    projectId: project.id,
    entryDate: input.entryDate,
    hours: input.hours,
    hourRate: user.hourRate,
    description: input.description,
  }),
  // User, project and rate are fixed at creation.
  apply: (target, input) => {
    target.entryDate = input.entryDate;
    target.hours = input.hours;
    target.description = input.description;
  },
  project: toView,
};

function utcDay(year: number, monthIndex: number, day: number): Date {
  // setUTCFullYear, unlike Date.UTC, does not remap years 0..99 to 19xx.
  const d = new Date(0);
  d.setUTCFullYear(year, monthIndex, day);
  return d;
}

/** [first of month, first of next month) in UTC. */
export function monthWindow(year: number, month: number): [Date, Date] {
  return [utcDay(year, month - 1, 1), utcDay(year, month, 1)];
}

export async function entriesForMonth(
  provider: StoreProvider,
  { userId, year, month }: MonthParams
): Promise<TimeEntryView[]> {
  const store = provider.open();
  const [from, to] = monthWindow(year, month);
  const entries = await store.timeEntries.forUserBetween(userId, from, to);
  const ctx = new ProjectionContext(store);
  const views: TimeEntryView[] = [];
  for (const e of entries) views.push(await toView(e, ctx));
  return views;
}
