// src/middleware/asyncExitStack.ts
/**
 * Purpose:
 * - Request-scoped state and cleanup via AsyncLocalStorage.
 * - Innermost-but-one layer of every chain: it opens a scope, lets code below
 *   register cleanup callbacks, and releases them on every exit path.
 *
 * Invariants:
 * - One scope per request; nothing here is shared between requests.
 * - Cleanups run LIFO, each exactly once.
 * - On the error path, cleanups finish before the error is passed outward.
 * - On the response path, cleanups run when the response finishes or closes.
 * - A failing cleanup never prevents later ones; the first failure is
 *   reported (passed outward if control is still ours, logged otherwise).
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { Request } from "express";
import type { IBoundLogger } from "../logger/Logger";
import { isRoutingSignal, type Dispatch } from "./types";

export type Cleanup = () => unknown;

export type RequestScope = {
  requestId: string;
  state: Map<string, unknown>;
};

type ScopeFrame = RequestScope & {
  cleanups: Cleanup[];
  closed: boolean;
};

const ALS = new AsyncLocalStorage<ScopeFrame>();

function header(req: Request, name: string): string | undefined {
  const raw = req.headers[name];
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw) && typeof raw[0] === "string") return raw[0];
  return undefined;
}

function resolveRequestId(req: Request): string {
  return (
    header(req, "x-request-id")?.trim() ||
    header(req, "x-correlation-id")?.trim() ||
    randomUUID()
  );
}

/** Best-effort getter (never throws). */
export function getRequestScope(): RequestScope | undefined {
  return ALS.getStore();
}

/**
 * Register a callback to run when the current request leaves the scope.
 * Throws outside a request scope.
 */
export function pushCleanup(fn: Cleanup): void {
  const frame = ALS.getStore();
  if (!frame) {
    throw new Error(
      "REQUEST_SCOPE_MISSING: pushCleanup() called outside a request scope."
    );
  }
  if (frame.closed) {
    throw new Error(
      `REQUEST_SCOPE_CLOSED: request ${frame.requestId} already released its resources.`
    );
  }
  frame.cleanups.push(fn);
}

async function drain(frame: ScopeFrame): Promise<unknown> {
  frame.closed = true;
  let failure: unknown;
  while (frame.cleanups.length) {
    const fn = frame.cleanups.pop();
    if (!fn) break;
    try {
      await fn();
    } catch (err) {
      if (failure === undefined) failure = err;
    }
  }
  return failure;
}

export type AsyncExitStackOptions = {
  log: IBoundLogger;
};

export function asyncExitStackMiddleware(
  app: Dispatch,
  options: AsyncExitStackOptions
): Dispatch {
  const log = options.log.bind({ layer: "asyncExitStack" });

  return (req, res, next) => {
    const frame: ScopeFrame = {
      requestId: resolveRequestId(req),
      state: new Map(),
      cleanups: [],
      closed: false,
    };
    res.setHeader("x-request-id", frame.requestId);

    let released = false;

    const release = (err?: unknown) => {
      if (released) return;
      released = true;
      drain(frame)
        .then((cleanupErr) => {
          const passing = err !== undefined && err !== null;
          if (cleanupErr !== undefined) {
            log.error(
              {
                requestId: frame.requestId,
                error: log.serializeError(cleanupErr),
                passingError: passing,
              },
              "request cleanup failed"
            );
          }
          if (passing) return next(err);
          if (cleanupErr !== undefined && !res.headersSent) {
            return next(cleanupErr);
          }
          if (!res.writableEnded && !res.headersSent) next();
        })
        .catch((e: unknown) => {
          log.error(
            { requestId: frame.requestId, error: log.serializeError(e) },
            "request scope release failed"
          );
        });
    };

    const onSettled = () => release();
    res.once("finish", onSettled);
    res.once("close", onSettled);

    ALS.run(frame, () => {
      try {
        app(req, res, (err?: unknown) => {
          res.off("finish", onSettled);
          res.off("close", onSettled);
          release(isRoutingSignal(err) ? undefined : err);
        });
      } catch (err) {
        res.off("finish", onSettled);
        res.off("close", onSettled);
        release(err);
      }
    });
  };
}
