// backend/services/timetracker/src/store/memoryStore.ts

/**
 * In-process StoreProvider (dev default, tests).
 *
 * Commits are all-or-nothing: staged writes are applied to a copy of the
 * tables, integrity is checked, and only then is the copy swapped in.
 * Readers always receive copies, never the stored objects.
 */

import {
  MissingRecordError,
  ReferentialIntegrityError,
  StagingArea,
  UNASSIGNED_ID,
  windowOf,
  type ClientRecord,
  type ProjectRecord,
  type RecordSet,
  type RecordStore,
  type ResourceKind,
  type Staged,
  type StoreProvider,
  type TimeEntryRecord,
  type TimeEntrySet,
  type UserRecord,
} from "./RecordStore";

type Tables = {
  users: Map<number, UserRecord>;
  clients: Map<number, ClientRecord>;
  projects: Map<number, ProjectRecord>;
  timeEntries: Map<number, TimeEntryRecord>;
};

const copyUser = (u: UserRecord): UserRecord => ({ ...u });
const copyClient = (c: ClientRecord): ClientRecord => ({ ...c });
const copyProject = (p: ProjectRecord): ProjectRecord => ({ ...p });
const copyEntry = (e: TimeEntryRecord): TimeEntryRecord => ({
  ...e,
  entryDate: new Date(e.entryDate.getTime()),
});

function emptyTables(): Tables {
  return {
    users: new Map(),
    clients: new Map(),
    projects: new Map(),
    timeEntries: new Map(),
  };
}

function copyTables(t: Tables): Tables {
  return {
    users: new Map(t.users),
    clients: new Map(t.clients),
    projects: new Map(t.projects),
    timeEntries: new Map(t.timeEntries),
  };
}

function byId<T extends { id: number }>(table: Map<number, T>): T[] {
  return [...table.values()].sort((a, b) => a.id - b.id);
}

class MemoryRecordSet<T extends { id: number }> implements RecordSet<T> {
  public readonly staging = new StagingArea<T>();

  public constructor(
    protected readonly table: () => Map<number, T>,
    protected readonly copy: (entity: T) => T
  ) {}

  public async find(id: number): Promise<T | null> {
    const hit = this.table().get(id);
    return hit ? this.copy(hit) : null;
  }

  public async list(skip: number, take: number): Promise<T[]> {
    return windowOf(byId(this.table()), skip, take).map(this.copy);
  }

  public async count(): Promise<number> {
    return this.table().size;
  }

  public add(entity: T): void {
    this.staging.stage("add", entity);
  }

  public update(entity: T): void {
    this.staging.stage("update", entity);
  }

  public remove(entity: T): void {
    this.staging.stage("remove", entity);
  }
}

class MemoryTimeEntrySet
  extends MemoryRecordSet<TimeEntryRecord>
  implements TimeEntrySet
{
  public async forUserBetween(
    userId: number,
    from: Date,
    to: Date
  ): Promise<TimeEntryRecord[]> {
    const lo = from.getTime();
    const hi = to.getTime();
    return [...this.table().values()]
      .filter((e) => {
        const t = e.entryDate.getTime();
        return e.userId === userId && t >= lo && t < hi;
      })
      .sort(
        (a, b) =>
          a.entryDate.getTime() - b.entryDate.getTime() || a.id - b.id
      )
      .map(this.copy);
  }
}

type MemorySets = {
  users: MemoryRecordSet<UserRecord>;
  clients: MemoryRecordSet<ClientRecord>;
  projects: MemoryRecordSet<ProjectRecord>;
  timeEntries: MemoryTimeEntrySet;
};

export class MemoryStoreProvider implements StoreProvider {
  public readonly kind = "memory";
  private tables: Tables = emptyTables();
  private readonly sequences: Record<ResourceKind, number> = {
    users: 0,
    clients: 0,
    projects: 0,
    timeEntries: 0,
  };

  public open(): RecordStore {
    const sets: MemorySets = {
      users: new MemoryRecordSet(() => this.tables.users, copyUser),
      clients: new MemoryRecordSet(() => this.tables.clients, copyClient),
      projects: new MemoryRecordSet(() => this.tables.projects, copyProject),
      timeEntries: new MemoryTimeEntrySet(
        () => this.tables.timeEntries,
        copyEntry
      ),
    };
    return {
      ...sets,
      commit: async () => this.apply(sets),
    };
  }

  public async ping(): Promise<void> {
    // always reachable
  }

  public async close(): Promise<void> {
    this.tables = emptyTables();
  }

  private apply(sets: MemorySets): void {
    const next = copyTables(this.tables);
    const seq = { ...this.sequences };
    const assignIds: Array<() => void> = [];

    const users = sets.users.staging.drain();
    const clients = sets.clients.staging.drain();
    const projects = sets.projects.staging.drain();
    const entries = sets.timeEntries.staging.drain();

    const add = <T extends { id: number }>(
      kind: ResourceKind,
      table: Map<number, T>,
      staged: Staged<T>[],
      copy: (e: T) => T
    ) => {
      for (const { op, entity } of staged) {
        if (op !== "add") continue;
        const id = ++seq[kind];
        table.set(id, { ...copy(entity), id });
        assignIds.push(() => {
          entity.id = id;
        });
      }
    };

    const update = <T extends { id: number }>(
      kind: ResourceKind,
      table: Map<number, T>,
      staged: Staged<T>[],
      copy: (e: T) => T
    ) => {
      for (const { op, entity } of staged) {
        if (op !== "update") continue;
        if (entity.id === UNASSIGNED_ID || !table.has(entity.id)) {
          throw new MissingRecordError(kind, entity.id);
        }
        table.set(entity.id, copy(entity));
      }
    };

    const removedIds = <T extends { id: number }>(staged: Staged<T>[]) =>
      new Set(staged.filter((s) => s.op === "remove").map((s) => s.entity.id));

    add("clients", next.clients, clients, copyClient);
    add("users", next.users, users, copyUser);
    add("projects", next.projects, projects, copyProject);
    add("timeEntries", next.timeEntries, entries, copyEntry);

    update("clients", next.clients, clients, copyClient);
    update("users", next.users, users, copyUser);
    update("projects", next.projects, projects, copyProject);
    update("timeEntries", next.timeEntries, entries, copyEntry);

    const goneClients = removedIds(clients);
    const goneUsers = removedIds(users);
    const goneProjects = removedIds(projects);
    const goneEntries = removedIds(entries);

    for (const p of next.projects.values()) {
      if (goneClients.has(p.clientId)) goneProjects.add(p.id);
    }
    for (const e of next.timeEntries.values()) {
      if (goneUsers.has(e.userId) || goneProjects.has(e.projectId)) {
        goneEntries.add(e.id);
      }
    }
    for (const id of goneEntries) next.timeEntries.delete(id);
    for (const id of goneProjects) next.projects.delete(id);
    for (const id of goneUsers) next.users.delete(id);
    for (const id of goneClients) next.clients.delete(id);

    checkIntegrity(next);

    this.tables = next;
    Object.assign(this.sequences, seq);
    for (const assign of assignIds) assign();
  }
}

function checkIntegrity(t: Tables): void {
  for (const p of t.projects.values()) {
    if (!t.clients.has(p.clientId)) {
      throw new ReferentialIntegrityError(
        `project ${p.id} references missing client ${p.clientId}`,
        { label: "Client", id: p.clientId }
      );
    }
  }
  for (const e of t.timeEntries.values()) {
    if (!t.users.has(e.userId)) {
      throw new ReferentialIntegrityError(
        `time entry ${e.id} references missing user ${e.userId}`,
        { label: "User", id: e.userId }
      );
    }
    if (!t.projects.has(e.projectId)) {
      throw new ReferentialIntegrityError(
        `time entry ${e.id} references missing project ${e.projectId}`,
        { label: "Project", id: e.projectId }
      );
    }
  }
}
