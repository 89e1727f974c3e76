// backend/services/timetracker/src/models/TimeEntry.ts
import { Schema, model } from "mongoose";
import type { TimeEntryRecord } from "../store/RecordStore";

export interface TimeEntryDocument {
  _id: number;
  userId: number;
  projectId: number;
  entryDate: Date;
  hours: number;
  hourRate: number;
  description: string;
}

const TimeEntrySchema = new Schema<TimeEntryDocument>(
  {
    _id: { type: Number, required: true },
    userId: { type: Number, required: true },
    projectId: { type: Number, required: true, index: true },
    entryDate: { type: Date, required: true },
    hours: { type: Number, required: true, min: 1, max: 24 },
    hourRate: { type: Number, required: true },
    description: { type: String, required: true, maxlength: 10_000 },
  },
  { versionKey: false, collection: "time_entries" }
);

// month-by-user queries
TimeEntrySchema.index({ userId: 1, entryDate: 1 });

export const TimeEntryModel = model<TimeEntryDocument>(
  "TimeEntry",
  TimeEntrySchema
);

export const timeEntryToRecord = (d: TimeEntryDocument): TimeEntryRecord => ({
  id: d._id,
  userId: d.userId,
  projectId: d.projectId,
  entryDate: new Date(d.entryDate),
  hours: d.hours,
  hourRate: d.hourRate,
  description: d.description,
});

export const timeEntryToDocument = (
  r: TimeEntryRecord
): TimeEntryDocument => ({
  _id: r.id,
  userId: r.userId,
  projectId: r.projectId,
  entryDate: r.entryDate,
  hours: r.hours,
  hourRate: r.hourRate,
  description: r.description,
});
