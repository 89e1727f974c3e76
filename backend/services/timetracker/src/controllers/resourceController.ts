// backend/services/timetracker/src/controllers/resourceController.ts

/**
 * HTTP adapter for a ResourceService: parse and validate, call the service,
 * turn its outcome into a status code. Never touches the store directly.
 */

import type { Request, RequestHandler, Response } from "express";
import type { z } from "zod";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { requestIdOf } from "@shared/middleware/requestId";
import { sendProblem } from "@shared/http/errors";
import { respond } from "@shared/http/respond";
import {
  pageQuerySchema,
  type PageQueryOptions,
  type PageRequest,
  type PagedResult,
} from "@shared/http/pagination";
import { logger } from "@shared/logger/logger";
import type { ProblemFactory } from "@shared/problem/problem";
import { zIdParams } from "../validators/common";
import { zPaged } from "../contracts/views";
import type {
  Created,
  Deleted,
  Found,
  NotFound,
  Updated,
} from "../services/resourceService";

/** The slice of ResourceService the HTTP layer needs. */
export interface ResourceOperations<I, V> {
  readonly label: string;
  getById(id: number): Promise<Found<V> | NotFound>;
  getPage(request: PageRequest): Promise<PagedResult<V>>;
  create(input: I): Promise<Created<V> | NotFound>;
  update(id: number, input: I): Promise<Updated<V> | NotFound>;
  remove(id: number): Promise<Deleted | NotFound>;
}

export type ResourceControllerDeps<I, V> = {
  service: ResourceOperations<I, V>;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  view: z.ZodType<V>;
  problems: ProblemFactory;
  paging: PageQueryOptions;
};

export type ResourceController = {
  getById: RequestHandler;
  getPage: RequestHandler;
  create: RequestHandler;
  update: RequestHandler;
  remove: RequestHandler;
};

export function makeResourceController<I, V>(
  deps: ResourceControllerDeps<I, V>
): ResourceController {
  const { service, input, view, problems } = deps;
  const pageQuery = pageQuerySchema(deps.paging);
  const paged = zPaged(view);

  /** Sends the 400 itself and returns undefined when the path id is bad. */
  const idOf = (req: Request, res: Response): number | undefined => {
    const parsed = zIdParams.safeParse(req.params);
    if (!parsed.success) {
      sendProblem(res, problems.fromZod(parsed.error, requestIdOf(req)));
      return undefined;
    }
    return parsed.data.id;
  };

  const bodyOf = (req: Request, res: Response): I | undefined => {
    const parsed = input.safeParse(req.body);
    if (!parsed.success) {
      sendProblem(res, problems.fromZod(parsed.error, requestIdOf(req)));
      return undefined;
    }
    return parsed.data;
  };

  const notFound = (req: Request, res: Response, outcome: NotFound) =>
    sendProblem(res, problems.notFound(outcome.detail, requestIdOf(req)));

  return {
    getById: asyncHandler(async (req, res) => {
      const id = idOf(req, res);
      if (id === undefined) return;
      logger.debug({ resource: service.label, id }, "getById: enter");
      const outcome = await service.getById(id);
      if (outcome.kind === "NotFound") return notFound(req, res, outcome);
      respond(res, view, outcome.value);
    }),

    getPage: asyncHandler(async (req, res) => {
      const parsed = pageQuery.safeParse(req.query);
      if (!parsed.success) {
        sendProblem(res, problems.fromZod(parsed.error, requestIdOf(req)));
        return;
      }
      logger.debug({ resource: service.label, ...parsed.data }, "getPage: enter");
      const result = await service.getPage(parsed.data);
      respond(res, paged, result);
    }),

    create: asyncHandler(async (req, res) => {
      const body = bodyOf(req, res);
      if (body === undefined) return;
      const outcome = await service.create(body);
      if (outcome.kind === "NotFound") return notFound(req, res, outcome);
      res.location(`${req.baseUrl}/${outcome.id}`);
      respond(res, view, outcome.value, 201);
    }),

    update: asyncHandler(async (req, res) => {
      const id = idOf(req, res);
      if (id === undefined) return;
      const body = bodyOf(req, res);
      if (body === undefined) return;
      const outcome = await service.update(id, body);
      if (outcome.kind === "NotFound") return notFound(req, res, outcome);
      respond(res, view, outcome.value);
    }),

    remove: asyncHandler(async (req, res) => {
      const id = idOf(req, res);
      if (id === undefined) return;
      const outcome = await service.remove(id);
      if (outcome.kind === "NotFound") return notFound(req, res, outcome);
      res.status(200).end();
    }),
  };
}
