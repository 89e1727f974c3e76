// backend/services/timetracker/src/models/Project.ts
import { Schema, model } from "mongoose";
import type { ProjectRecord } from "../store/RecordStore";

export interface ProjectDocument {
  _id: number;
  name: string;
  clientId: number;
}

const ProjectSchema = new Schema<ProjectDocument>(
  {
    _id: { type: Number, required: true },
    name: { type: String, required: true, trim: true, maxlength: 100 },
    clientId: { type: Number, required: true, index: true },
  },
  { versionKey: false, collection: "projects" }
);

export const ProjectModel = model<ProjectDocument>("Project", ProjectSchema);

export const projectToRecord = (d: ProjectDocument): ProjectRecord => ({
  id: d._id,
  name: d.name,
  clientId: d.clientId,
});

export const projectToDocument = (r: ProjectRecord): ProjectDocument => ({
  _id: r.id,
  name: r.name,
  clientId: r.clientId,
});
