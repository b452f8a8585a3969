// src/middleware/exceptions.ts
/**
 * Purpose:
 * - The two error boundaries that bracket user middleware:
 *   - errorBoundaryMiddleware: outermost layer. Sees errors raised anywhere in
 *     the chain, user middleware included.
 *   - exceptionMiddleware: inner catch-all, directly around the request scope
 *     and router.
 *
 * Dispatch (both):
 *   most specific per-kind handler → designated error handler → propagate.
 *
 * Invariants:
 * - Non-Error throwables are wrapped so handlers always receive an Error.
 * - A handler that fails, or an error after headers went out, propagates
 *   unchanged to the enclosing layer (never swallowed).
 * - In debug mode the outer boundary renders unmatched errors itself,
 *   including the stack; otherwise they go to the Express error funnel.
 */

import type { NextFunction, Request, Response } from "express";
import type { IBoundLogger } from "../logger/Logger";
import type { ExceptionHandler, ExceptionKey } from "../exceptions/types";
import { lookupExceptionHandler } from "../exceptions/handlerRegistry";
import type { ProblemFactory } from "../problem/problem";
import { isRoutingSignal, type Dispatch } from "./types";
import { getRequestScope } from "./asyncExitStack";

export type ExceptionBoundaryOptions = {
  handlers: ReadonlyMap<ExceptionKey, ExceptionHandler>;
  errorHandler?: ExceptionHandler;
  debug: boolean;
  log: IBoundLogger;
};

export type ErrorBoundaryOptions = ExceptionBoundaryOptions & {
  problems: ProblemFactory;
};

export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  const e = new Error(typeof err === "string" ? err : "Non-error value thrown");
  e.name = "NonErrorThrown";
  return e;
}

/** Run `app`, routing sync throws and next(err) into `onError`. */
function guarded(
  app: Dispatch,
  req: Request,
  res: Response,
  next: NextFunction,
  onError: (err: Error) => void
): void {
  try {
    app(req, res, (err?: unknown) => {
      if (err === undefined || err === null || isRoutingSignal(err)) {
        return next(err);
      }
      onError(toError(err));
    });
  } catch (err) {
    onError(toError(err));
  }
}

function invoke(
  handler: ExceptionHandler,
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  Promise.resolve()
    .then(() => handler(err, req, res))
    .catch(next);
}

function resolveHandler(
  opts: ExceptionBoundaryOptions,
  err: Error
): ExceptionHandler | undefined {
  return lookupExceptionHandler(opts.handlers, err) ?? opts.errorHandler;
}

export function exceptionMiddleware(
  app: Dispatch,
  options: ExceptionBoundaryOptions
): Dispatch {
  const log = options.log.bind({ layer: "exceptionMiddleware" });

  return (req, res, next) => {
    guarded(app, req, res, next, (err) => {
      const handler = res.headersSent ? undefined : resolveHandler(options, err);
      if (!handler) return next(err);

      log.debug({ errorName: err.name, path: req.path }, "handling error");
      invoke(handler, err, req, res, next);
    });
  };
}

export function errorBoundaryMiddleware(
  app: Dispatch,
  options: ErrorBoundaryOptions
): Dispatch {
  const log = options.log.bind({ layer: "errorBoundary" });

  return (req, res, next) => {
    guarded(app, req, res, next, (err) => {
      if (res.headersSent) return next(err);

      const handler = resolveHandler(options, err);
      if (handler) {
        invoke(handler, err, req, res, next);
        return;
      }

      if (!options.debug) return next(err);

      log.error(
        { path: req.path, error: log.serializeError(err) },
        "unhandled error (debug)"
      );
      const p = options.problems.internalError(err.message);
      const requestId = getRequestScope()?.requestId;
      res.status(500).json({
        ...p,
        ...(requestId ? { requestId } : {}),
        meta: { name: err.name, stack: err.stack?.split("\n") ?? [] },
      });
    });
  };
}
