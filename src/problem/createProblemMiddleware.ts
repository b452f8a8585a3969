// src/problem/createProblemMiddleware.ts
/**
 * Purpose:
 * - Express-only final error funnel, installed after the application's
 *   handle on its Express instance.
 * - Honors HttpException status codes; anything else is a logged 500.
 *
 * Invariants:
 * - Express import allowed here (adapter).
 * - No process.env reads.
 * - Once headers are out, the error is handed to Express's default handler.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { isHttpException } from "../errors/exceptions";
import type { IBoundLogger } from "../logger/Logger";
import { getRequestScope } from "../middleware/asyncExitStack";
import { ProblemFactory, type ProblemJson } from "./problem";

function requestIdOf(res: { getHeader(name: string): unknown }): string | undefined {
  const scoped = getRequestScope()?.requestId;
  if (scoped) return scoped;
  const h = res.getHeader("x-request-id");
  return typeof h === "string" ? h : undefined;
}

export function createProblemMiddleware(opts: {
  log: IBoundLogger;
  problems: ProblemFactory;
}): ErrorRequestHandler {
  const { log, problems } = opts;

  return (err, req, res, next) => {
    if (res.headersSent) return next(err);

    const requestId = requestIdOf(res);

    // 1) Explicit HTTP errors keep their status and headers
    if (isHttpException(err)) {
      if (err.headers) res.set(err.headers);
      const p: ProblemJson = problems.fromHttpException(err);
      if (requestId) p.requestId = requestId;
      return res.status(err.status).json(p);
    }

    // 2) Unexpected errors -> generic response + log
    const e = err instanceof Error ? err : null;
    log.error(
      {
        path: req.path,
        requestId,
        error: e ? { name: e.name, message: e.message, stack: e.stack } : String(err),
      },
      "unhandled error in request pipeline"
    );

    const p: ProblemJson = problems.internalError();
    if (requestId) p.requestId = requestId;
    return res.status(500).json(p);
  };
}

/** Terminal 404 for requests no route claimed. */
export function createNotFoundHandler(problems: ProblemFactory): RequestHandler {
  return (req, res) => {
    const p = problems.fromStatus(
      404,
      `No route for ${req.method} ${req.path}`,
      "NOT_FOUND"
    );
    const requestId = requestIdOf(res);
    if (requestId) p.requestId = requestId;
    res.status(404).json(p);
  };
}
