// backend/services/timetracker/src/models/Counter.ts
import { Schema, model } from "mongoose";

/** One row per collection; `seq` is the last id handed out. */
export interface CounterDocument {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<CounterDocument>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { versionKey: false, collection: "counters" }
);

export const CounterModel = model<CounterDocument>("Counter", CounterSchema);

export async function nextId(collection: string): Promise<number> {
  const row = await CounterModel.findOneAndUpdate(
    { _id: collection },
    { $inc: { seq: 1 } },
    { upsert: true, new: true }
  )
    .lean<CounterDocument>()
    .exec();
  if (!row) throw new Error(`counter ${collection} did not upsert`);
  return row.seq;
}
