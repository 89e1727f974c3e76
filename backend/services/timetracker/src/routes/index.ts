// backend/services/timetracker/src/routes/index.ts
import express, { type RequestHandler, type Router } from "express";
import type { ResourceController } from "../controllers/resourceController";
import { resourceRouter } from "./resourceRoutes";

export type ApiControllers = {
  users: ResourceController;
  clients: ResourceController;
  projects: ResourceController;
  timeEntries: ResourceController;
  timeEntriesForMonth: RequestHandler;
};

/** Users arrived in v2; clients, projects and time entries exist in every version. */
export function apiRoutes(
  ctrl: ApiControllers,
  adminOnly: RequestHandler,
  version: number
): Router {
  const r = express.Router();
  if (version >= 2) r.use("/users", resourceRouter(ctrl.users, adminOnly));
  r.use("/clients", resourceRouter(ctrl.clients, adminOnly));
  r.use("/projects", resourceRouter(ctrl.projects, adminOnly));
  r.use(
    "/time-entries",
    resourceRouter(ctrl.timeEntries, adminOnly, (te) =>
      te.get("/user/:userId/:year/:month", ctrl.timeEntriesForMonth)
    )
  );
  return r;
}
