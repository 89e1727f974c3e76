// backend/services/shared/src/middleware/problemJson.ts

/**
 * Tail middleware: the single error boundary for every request.
 *
 * - ProblemError carries its own problem and is sent as-is.
 * - Client errors raised by Express itself (malformed JSON, oversized body)
 *   keep their 4xx status.
 * - Anything else is a 500; the full error is logged, the client gets
 *   whatever ProblemFactory.internalError allows.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../logger/logger";
import { sendProblem } from "../http/errors";
import { ProblemError, type ProblemFactory } from "../problem/problem";
import { requestIdOf } from "./requestId";

export function notFoundProblemJson(problems: ProblemFactory): RequestHandler {
  return (req, res) => {
    sendProblem(
      res,
      problems.notFound(
        `Route not found: ${req.method} ${req.path}`,
        requestIdOf(req)
      )
    );
  };
}

function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const raw =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof raw === "number" && raw >= 400 && raw < 500 ? raw : undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorProblemJson(problems: ProblemFactory) {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const instance = requestIdOf(req);

    if (err instanceof ProblemError) {
      sendProblem(res, { ...err.problem, instance });
      return;
    }

    const clientStatus = clientStatusOf(err);
    if (clientStatus !== undefined) {
      logger.warn(
        { requestId: instance, status: clientStatus, detail: messageOf(err) },
        "request rejected"
      );
      sendProblem(res, {
        ...problems.badRequest(messageOf(err), instance),
        status: clientStatus,
        title: clientStatus === 400 ? "Bad Request" : "Request Error",
      });
      return;
    }

    logger.error(
      { err, requestId: instance, method: req.method, path: req.originalUrl },
      "unhandled error"
    );
    sendProblem(res, problems.internalError(err, instance));
  };
}
