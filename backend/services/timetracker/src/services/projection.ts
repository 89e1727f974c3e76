// backend/services/timetracker/src/services/projection.ts
import type {
  ClientRecord,
  ProjectRecord,
  RecordStore,
  UserRecord,
} from "../store/RecordStore";

/**
 * Memoized reference lookups for building view models, so a page of twenty
 * entries under one client reads that client once.
 */
export class ProjectionContext {
  private readonly users = new Map<number, Promise<UserRecord>>();
  private readonly clients = new Map<number, Promise<ClientRecord>>();
  private readonly projects = new Map<number, Promise<ProjectRecord>>();

  public constructor(private readonly store: RecordStore) {}

  public user(id: number): Promise<UserRecord> {
    return memo(this.users, id, () => this.store.users.find(id), "user");
  }

  public client(id: number): Promise<ClientRecord> {
    return memo(this.clients, id, () => this.store.clients.find(id), "client");
  }

  public project(id: number): Promise<ProjectRecord> {
    return memo(
      this.projects,
      id,
      () => this.store.projects.find(id),
      "project"
    );
  }
}

function memo<T>(
  cache: Map<number, Promise<T>>,
  id: number,
  load: () => Promise<T | null>,
  what: string
): Promise<T> {
  const hit = cache.get(id);
  if (hit) return hit;
  const pending = load().then((found) => {
    if (!found) throw new Error(`dangling ${what} reference ${id}`);
    return found;
  });
  cache.set(id, pending);
  return pending;
}
