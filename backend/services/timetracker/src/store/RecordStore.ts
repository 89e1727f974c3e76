// backend/services/timetracker/src/store/RecordStore.ts

/**
 * Persistence seam for the time-tracking resources.
 *
 * A `RecordStore` is a per-request unit of work: reads go straight to the
 * backing store, writes are staged by `add`/`update`/`remove` and become
 * visible together on `commit()`. Ids are assigned at commit time by writing
 * to the staged entity's `id`.
 *
 * Removing a client removes its projects and their time entries; removing a
 * user or a project removes its time entries.
 */

import type { PageSource } from "@shared/http/pagination";

export type UserRecord = { id: number; name: string; hourRate: number };

export type ClientRecord = { id: number; name: string };

export type ProjectRecord = { id: number; name: string; clientId: number };

export type TimeEntryRecord = {
  id: number;
  userId: number;
  projectId: number;
  /** Calendar date at UTC midnight. */
  entryDate: Date;
  hours: number;
  /** Copy of the user's rate when the entry was created. */
  hourRate: number;
  description: string;
};

export type ResourceKind = "users" | "clients" | "projects" | "timeEntries";

export type RecordOf = {
  users: UserRecord;
  clients: ClientRecord;
  projects: ProjectRecord;
  timeEntries: TimeEntryRecord;
};

/** Placeholder id for entities that have not been committed yet. */
export const UNASSIGNED_ID = 0;

export interface RecordSet<T extends { id: number }> extends PageSource<T> {
  find(id: number): Promise<T | null>;
  /** Store-default order (id ascending). */
  list(skip: number, take: number): Promise<T[]>;
  count(): Promise<number>;
  add(entity: T): void;
  update(entity: T): void;
  remove(entity: T): void;
}

export interface TimeEntrySet extends RecordSet<TimeEntryRecord> {
  /** Entries of `userId` with from ≤ entryDate < to, ordered by entryDate then id. */
  forUserBetween(userId: number, from: Date, to: Date): Promise<TimeEntryRecord[]>;
}

export interface RecordStore {
  readonly users: RecordSet<UserRecord>;
  readonly clients: RecordSet<ClientRecord>;
  readonly projects: RecordSet<ProjectRecord>;
  readonly timeEntries: TimeEntrySet;
  commit(): Promise<void>;
}

export interface StoreProvider {
  readonly kind: string;
  open(): RecordStore;
  /** Rejects when the backing store is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** An entity a commit refers to, e.g. `{ label: "Client", id: 2 }`. */
export type RecordRef = { label: string; id: number };

/** Thrown when a commit would leave a dangling reference. */
export class ReferentialIntegrityError extends Error {
  public constructor(
    detail: string,
    public readonly missing: RecordRef
  ) {
    super(`Referential integrity violation: ${detail}`);
    this.name = "ReferentialIntegrityError";
  }
}

/** Thrown when a commit updates a record another commit has removed. */
export class MissingRecordError extends Error {
  public constructor(
    kind: string,
    public readonly id: number
  ) {
    super(`${kind}: cannot update missing record ${id}`);
    this.name = "MissingRecordError";
  }
}

export type StagedOp = "add" | "update" | "remove";

export type Staged<T> = { op: StagedOp; entity: T };

/**
 * Pending writes for one record set. Adapters apply them on commit in a fixed
 * order: adds parent-first, then updates, then removes.
 */
export class StagingArea<T> {
  private pending: Staged<T>[] = [];

  public stage(op: StagedOp, entity: T): void {
    this.pending.push({ op, entity });
  }

  /** Hands over the staged writes and starts afresh. */
  public drain(): Staged<T>[] {
    const out = this.pending;
    this.pending = [];
    return out;
  }

  public get size(): number {
    return this.pending.length;
  }
}

export function windowOf<T>(sorted: T[], skip: number, take: number): T[] {
  const from = Math.max(0, Math.trunc(skip));
  const count = Math.max(0, Math.trunc(take));
  return sorted.slice(from, from + count);
}
