// backend/services/timetracker/src/store/mongoStore.ts

/**
 * MongoDB StoreProvider (mongoose).
 *
 * - Numeric ids come from the `counters` collection, one sequence per collection.
 * - A commit applies its writes in order (adds parent-first, updates, removes)
 *   without a multi-document transaction; a failure mid-commit can leave the
 *   earlier writes in place.
 * - References are checked before writing, since Mongo enforces none.
 */

import mongoose, { type Model } from "mongoose";
import { logger } from "@shared/logger/logger";
import {
  MissingRecordError,
  ReferentialIntegrityError,
  StagingArea,
  type ClientRecord,
  type ProjectRecord,
  type RecordSet,
  type RecordStore,
  type StoreProvider,
  type TimeEntryRecord,
  type TimeEntrySet,
  type UserRecord,
} from "./RecordStore";
import { nextId } from "../models/Counter";
import {
  UserModel,
  userToDocument,
  userToRecord,
  type UserDocument,
} from "../models/User";
import {
  ClientModel,
  clientToDocument,
  clientToRecord,
  type ClientDocument,
} from "../models/Client";
import {
  ProjectModel,
  projectToDocument,
  projectToRecord,
  type ProjectDocument,
} from "../models/Project";
import {
  TimeEntryModel,
  timeEntryToDocument,
  timeEntryToRecord,
  type TimeEntryDocument,
} from "../models/TimeEntry";

type Mapping<T, D> = {
  model: Model<D>;
  collection: string;
  toRecord: (d: D) => T;
  toDocument: (r: T) => D;
};

class MongoRecordSet<T extends { id: number }, D extends { _id: number }>
  implements RecordSet<T>
{
  public readonly staging = new StagingArea<T>();

  public constructor(protected readonly map: Mapping<T, D>) {}

  public async find(id: number): Promise<T | null> {
    const doc = await this.map.model.findById(id).lean<D>().exec();
    return doc ? this.map.toRecord(doc) : null;
  }

  public async list(skip: number, take: number): Promise<T[]> {
    const docs = await this.map.model
      .find()
      .sort({ _id: 1 })
      .skip(Math.max(0, Math.trunc(skip)))
      .limit(Math.max(0, Math.trunc(take)))
      .lean<D[]>()
      .exec();
    return docs.map(this.map.toRecord);
  }

  public async count(): Promise<number> {
    return this.map.model.countDocuments().exec();
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

  /** Inserts staged adds and writes the assigned id back to each entity. */
  public async flushAdds(adds: T[]): Promise<void> {
    for (const entity of adds) {
      const id = await nextId(this.map.collection);
      await this.map.model.create(this.map.toDocument({ ...entity, id }));
      entity.id = id;
    }
  }

  public async flushUpdates(updates: T[]): Promise<void> {
    for (const entity of updates) {
      const doc = await this.map.model.findById(entity.id).exec();
      if (!doc) {
        throw new MissingRecordError(this.map.collection, entity.id);
      }
      doc.set(this.map.toDocument(entity));
      await doc.save();
    }
  }
}

class MongoTimeEntrySet
  extends MongoRecordSet<TimeEntryRecord, TimeEntryDocument>
  implements TimeEntrySet
{
  public async forUserBetween(
    userId: number,
    from: Date,
    to: Date
  ): Promise<TimeEntryRecord[]> {
    const docs = await TimeEntryModel.find({
      userId,
      entryDate: { $gte: from, $lt: to },
    })
      .sort({ entryDate: 1, _id: 1 })
      .lean<TimeEntryDocument[]>()
      .exec();
    return docs.map(timeEntryToRecord);
  }
}

type MongoSets = {
  users: MongoRecordSet<UserRecord, UserDocument>;
  clients: MongoRecordSet<ClientRecord, ClientDocument>;
  projects: MongoRecordSet<ProjectRecord, ProjectDocument>;
  timeEntries: MongoTimeEntrySet;
};

function split<T>(sets: StagingArea<T>) {
  const staged = sets.drain();
  const pick = (op: "add" | "update" | "remove") =>
    staged.filter((s) => s.op === op).map((s) => s.entity);
  return { adds: pick("add"), updates: pick("update"), removes: pick("remove") };
}

async function assertProjectRefs(projects: ProjectRecord[]): Promise<void> {
  for (const p of projects) {
    if (!(await ClientModel.exists({ _id: p.clientId }))) {
      throw new ReferentialIntegrityError(
        `project ${p.id} references missing client ${p.clientId}`,
        { label: "Client", id: p.clientId }
      );
    }
  }
}

async function assertEntryRefs(entries: TimeEntryRecord[]): Promise<void> {
  for (const e of entries) {
    if (!(await UserModel.exists({ _id: e.userId }))) {
      throw new ReferentialIntegrityError(
        `time entry ${e.id} references missing user ${e.userId}`,
        { label: "User", id: e.userId }
      );
    }
    if (!(await ProjectModel.exists({ _id: e.projectId }))) {
      throw new ReferentialIntegrityError(
        `time entry ${e.id} references missing project ${e.projectId}`,
        { label: "Project", id: e.projectId }
      );
    }
  }
}

export class MongoStoreProvider implements StoreProvider {
  public readonly kind = "mongo";

  public constructor(private readonly uri: string) {}

  public async connect(): Promise<void> {
    mongoose.set("strictQuery", true);
    await mongoose.connect(this.uri);
    logger.info(
      {
        component: "mongodb",
        uri: this.uri.replace(/:\/\/.*@/, "://***:***@"),
      },
      "[timetracker] MongoDB connected"
    );
  }

  public open(): RecordStore {
    const sets: MongoSets = {
      users: new MongoRecordSet({
        model: UserModel,
        collection: "users",
        toRecord: userToRecord,
        toDocument: userToDocument,
      }),
      clients: new MongoRecordSet({
        model: ClientModel,
        collection: "clients",
        toRecord: clientToRecord,
        toDocument: clientToDocument,
      }),
      projects: new MongoRecordSet({
        model: ProjectModel,
        collection: "projects",
        toRecord: projectToRecord,
        toDocument: projectToDocument,
      }),
      timeEntries: new MongoTimeEntrySet({
        model: TimeEntryModel,
        collection: "time_entries",
        toRecord: timeEntryToRecord,
        toDocument: timeEntryToDocument,
      }),
    };
    return { ...sets, commit: () => this.apply(sets) };
  }

  public async ping(): Promise<void> {
    const db = mongoose.connection.db;
    if (mongoose.connection.readyState !== 1 || !db) {
      throw new Error("MongoDB is not connected");
    }
    await db.admin().ping();
  }

  public async close(): Promise<void> {
    await mongoose.disconnect();
  }

  private async apply(sets: MongoSets): Promise<void> {
    const clients = split(sets.clients.staging);
    const users = split(sets.users.staging);
    const projects = split(sets.projects.staging);
    const entries = split(sets.timeEntries.staging);

    await sets.clients.flushAdds(clients.adds);
    await sets.users.flushAdds(users.adds);
    await assertProjectRefs(projects.adds);
    await sets.projects.flushAdds(projects.adds);
    await assertEntryRefs(entries.adds);
    await sets.timeEntries.flushAdds(entries.adds);

    await sets.clients.flushUpdates(clients.updates);
    await sets.users.flushUpdates(users.updates);
    await assertProjectRefs(projects.updates);
    await sets.projects.flushUpdates(projects.updates);
    await assertEntryRefs(entries.updates);
    await sets.timeEntries.flushUpdates(entries.updates);

    const clientIds = clients.removes.map((c) => c.id);
    const userIds = users.removes.map((u) => u.id);
    const owned = await ProjectModel.find({ clientId: { $in: clientIds } })
      .lean<ProjectDocument[]>()
      .exec();
    const projectIds = [
      ...projects.removes.map((p) => p.id),
      ...owned.map((p) => p._id),
    ];

    await TimeEntryModel.deleteMany({
      $or: [
        { _id: { $in: entries.removes.map((e) => e.id) } },
        { projectId: { $in: projectIds } },
        { userId: { $in: userIds } },
      ],
    }).exec();
    await ProjectModel.deleteMany({ _id: { $in: projectIds } }).exec();
    await UserModel.deleteMany({ _id: { $in: userIds } }).exec();
    await ClientModel.deleteMany({ _id: { $in: clientIds } }).exec();
  }
}
