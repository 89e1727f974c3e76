// backend/services/timetracker/src/models/User.ts
import { Schema, model } from "mongoose";
import type { UserRecord } from "../store/RecordStore";

export interface UserDocument {
  _id: number;
  name: string;
  hourRate: number;
}

const UserSchema = new Schema<UserDocument>(
  {
    _id: { type: Number, required: true },
    name: { type: String, required: true, trim: true, maxlength: 100 },
    hourRate: { type: Number, required: true },
  },
  { versionKey: false, collection: "users" }
);

export const UserModel = model<UserDocument>("User", UserSchema);

export const userToRecord = (d: UserDocument): UserRecord => ({
  id: d._id,
  name: d.name,
  hourRate: d.hourRate,
});

export const userToDocument = (r: UserRecord): UserDocument => ({
  _id: r.id,
  name: r.name,
  hourRate: r.hourRate,
});
