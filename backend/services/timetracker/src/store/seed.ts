// backend/services/timetracker/src/store/seed.ts

/**
 * Sample data for a fresh store. Only runs when every collection is empty,
 * so restarting against a populated database changes nothing.
 */

import { z } from "zod";
import { logger } from "@shared/logger/logger";
import seedJson from "./seed.json";
import {
  UNASSIGNED_ID,
  type ClientRecord,
  type ProjectRecord,
  type StoreProvider,
  type UserRecord,
} from "./RecordStore";

const zSeed = z.object({
  users: z.array(
    z.object({ key: z.string(), name: z.string(), hourRate: z.number() })
  ),
  clients: z.array(z.object({ key: z.string(), name: z.string() })),
  projects: z.array(
    z.object({ key: z.string(), name: z.string(), client: z.string() })
  ),
  timeEntries: z.array(
    z.object({
      user: z.string(),
      project: z.string(),
      entryDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
      hours: z.number().int(),
      description: z.string(),
    })
  ),
});

export type SeedData = z.infer<typeof zSeed>;

export const defaultSeed: SeedData = zSeed.parse(seedJson);

function lookup<T>(map: Map<string, T>, key: string, what: string): T {
  const hit = map.get(key);
  if (!hit) throw new Error(`seed: unknown ${what} "${key}"`);
  return hit;
}

/** Returns true when data was written. */
export async function seedIfEmpty(
  provider: StoreProvider,
  data: SeedData = defaultSeed
): Promise<boolean> {
  const store = provider.open();
  const counts = await Promise.all([
    store.users.count(),
    store.clients.count(),
    store.projects.count(),
    store.timeEntries.count(),
  ]);
  if (counts.some((n) => n > 0)) {
    logger.debug({ counts }, "[timetracker] store not empty, seed skipped");
    return false;
  }

  const users = new Map<string, UserRecord>();
  for (const u of data.users) {
    const rec = { id: UNASSIGNED_ID, name: u.name, hourRate: u.hourRate };
    users.set(u.key, rec);
    store.users.add(rec);
  }
  const clients = new Map<string, ClientRecord>();
  for (const c of data.clients) {
    const rec = { id: UNASSIGNED_ID, name: c.name };
    clients.set(c.key, rec);
    store.clients.add(rec);
  }
  await store.commit();

  const projects = new Map<string, ProjectRecord>();
  for (const p of data.projects) {
    const rec = {
      id: UNASSIGNED_ID,
      name: p.name,
      clientId: lookup(clients, p.client, "client").id,
    };
    projects.set(p.key, rec);
    store.projects.add(rec);
  }
  await store.commit();

  for (const e of data.timeEntries) {
    const user = lookup(users, e.user, "user");
    store.timeEntries.add({
      id: UNASSIGNED_ID,
      userId: user.id,
      projectId: lookup(projects, e.project, "project").id,
      entryDate: new Date(`${e.entryDate}T00:00:00.000Z`),
      hours: e.hours,
      hourRate: user.hourRate,
      description: e.description,
    });
  }
  await store.commit();

  logger.info(
    {
      users: data.users.length,
      clients: data.clients.length,
      projects: data.projects.length,
      timeEntries: data.timeEntries.length,
    },
    "[timetracker] seeded empty store"
  );
  return true;
}
