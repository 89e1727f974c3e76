// shared/interfaces/TimeTracker.ts
export type {
  UserView,
  ClientView,
  ProjectView,
  TimeEntryView,
} from "../../../backend/services/timetracker/src/contracts/views";
export type { PagedResult } from "../../../backend/services/shared/src/http/pagination";

export interface UserInput {
  name: string;
  hourRate: number;
}

export interface ClientInput {
  name: string;
}

export interface ProjectInput {
  name: string;
  clientId: number;
}

export interface TimeEntryInput {
  userId: number;
  projectId: number;
  entryDate: string;         // YYYY-MM-DD
  hours: number;
  description: string;
}
