// backend/services/timetracker/src/services/resourceService.ts

/**
 * One CRUD service shape, instantiated per resource by a ResourceDefinition.
 *
 * Expected conditions (missing id, missing reference) come back as typed
 * outcomes; only store faults and programming errors throw. Each call runs in
 * its own unit of work.
 */

import {
  mapPage,
  paginate,
  type PageRequest,
  type PagedResult,
} from "@shared/http/pagination";
import { logger } from "@shared/logger/logger";
import {
  MissingRecordError,
  ReferentialIntegrityError,
  type RecordSet,
  type RecordStore,
  type StoreProvider,
} from "../store/RecordStore";
import { ProjectionContext } from "./projection";

export type Found<V> = { kind: "Found"; value: V };
export type NotFound = { kind: "NotFound"; detail: string };
export type Created<V> = { kind: "Created"; id: number; value: V };
export type Updated<V> = { kind: "Updated"; value: V };
export type Deleted = { kind: "Deleted" };

export type Resolution<R> = { ok: true; refs: R } | { ok: false; detail: string };

export interface ResourceDefinition<T extends { id: number }, I, V, R> {
  /** Singular display name, e.g. "User". */
  readonly label: string;
  set(store: RecordStore): RecordSet<T>;
  /** Looks up every entity the input refers to. */
  resolve(store: RecordStore, input: I): Promise<Resolution<R>>;
  create(input: I, refs: R): T;
  /** Copies the mutable fields only; everything else on `target` is kept. */
  apply(target: T, input: I, refs: R): void;
  project(record: T, ctx: ProjectionContext): Promise<V>;
}

export const noRefs = async (): Promise<Resolution<undefined>> => ({
  ok: true,
  refs: undefined,
});

export class ResourceService<T extends { id: number }, I, V, R> {
  public constructor(
    private readonly provider: StoreProvider,
    private readonly def: ResourceDefinition<T, I, V, R>
  ) {}

  public get label(): string {
    return this.def.label;
  }

  private missing(id: number): NotFound {
    return { kind: "NotFound", detail: `${this.def.label} ${id} not found` };
  }

  /**
   * Commits, mapping writes that lost a race with a concurrent delete
   * (reference or target gone by commit time) to NotFound.
   */
  private async commit(store: RecordStore, id: number): Promise<NotFound | undefined> {
    try {
      await store.commit();
      return undefined;
    } catch (err) {
      if (err instanceof ReferentialIntegrityError) {
        const { label, id: refId } = err.missing;
        return { kind: "NotFound", detail: `${label} ${refId} not found` };
      }
      if (err instanceof MissingRecordError) return this.missing(id);
      throw err;
    }
  }

  public async getById(id: number): Promise<Found<V> | NotFound> {
    const store = this.provider.open();
    const record = await this.def.set(store).find(id);
    if (!record) return this.missing(id);
    const ctx = new ProjectionContext(store);
    return { kind: "Found", value: await this.def.project(record, ctx) };
  }

  public async getPage(request: PageRequest): Promise<PagedResult<V>> {
    const store = this.provider.open();
    const page = await paginate(this.def.set(store), request);
    const ctx = new ProjectionContext(store);
    return mapPage(page, (record) => this.def.project(record, ctx));
  }

  public async create(input: I): Promise<Created<V> | NotFound> {
    const store = this.provider.open();
    const resolved = await this.def.resolve(store, input);
    if (!resolved.ok) return { kind: "NotFound", detail: resolved.detail };

    const record = this.def.create(input, resolved.refs);
    this.def.set(store).add(record);
    const lost = await this.commit(store, record.id);
    if (lost) return lost;
    logger.debug({ resource: this.def.label, id: record.id }, "created");

    const ctx = new ProjectionContext(store);
    return {
      kind: "Created",
      id: record.id,
      value: await this.def.project(record, ctx),
    };
  }

  public async update(id: number, input: I): Promise<Updated<V> | NotFound> {
    const store = this.provider.open();
    const set = this.def.set(store);
    const record = await set.find(id);
    if (!record) return this.missing(id);

    const resolved = await this.def.resolve(store, input);
    if (!resolved.ok) return { kind: "NotFound", detail: resolved.detail };

    this.def.apply(record, input, resolved.refs);
    set.update(record);
    const lost = await this.commit(store, id);
    if (lost) return lost;
    logger.debug({ resource: this.def.label, id }, "updated");

    const ctx = new ProjectionContext(store);
    return { kind: "Updated", value: await this.def.project(record, ctx) };
  }

  public async remove(id: number): Promise<Deleted | NotFound> {
    const store = this.provider.open();
    const set = this.def.set(store);
    const record = await set.find(id);
    if (!record) return this.missing(id);

    set.remove(record);
    await store.commit();
    logger.debug({ resource: this.def.label, id }, "deleted");
    return { kind: "Deleted" };
  }
}
