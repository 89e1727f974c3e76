// backend/services/timetracker/src/routes/resourceRoutes.ts
import express, { type RequestHandler, type Router } from "express";
import type { ResourceController } from "../controllers/resourceController";

/** Reads need a token; writes also need the admin role. */
export function resourceRouter(
  ctrl: ResourceController,
  adminOnly: RequestHandler,
  extend?: (router: Router) => void
): Router {
  const r = express.Router();
  extend?.(r);
  r.get("/", ctrl.getPage);
  r.get("/:id", ctrl.getById);
  r.post("/", adminOnly, ctrl.create);
  r.put("/:id", adminOnly, ctrl.update);
  r.delete("/:id", adminOnly, ctrl.remove);
  return r;
}
