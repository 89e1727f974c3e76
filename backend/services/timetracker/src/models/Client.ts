// backend/services/timetracker/src/models/Client.ts
import { Schema, model } from "mongoose";
import type { ClientRecord } from "../store/RecordStore";

export interface ClientDocument {
  _id: number;
  name: string;
}

const ClientSchema = new Schema<ClientDocument>(
  {
    _id: { type: Number, required: true },
    name: { type: String, required: true, trim: true, maxlength: 100 },
  },
  { versionKey: false, collection: "clients" }
);

export const ClientModel = model<ClientDocument>("Client", ClientSchema);

export const clientToRecord = (d: ClientDocument): ClientRecord => ({
  id: d._id,
  name: d.name,
});

export const clientToDocument = (r: ClientRecord): ClientDocument => ({
  _id: r.id,
  name: r.name,
});
