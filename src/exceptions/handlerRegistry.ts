// src/exceptions/handlerRegistry.ts
/**
 * Purpose:
 * - Resolve the application's exception handlers into:
 *   - `handlers`: per-kind map used for typed dispatch
 *   - `errorHandler`: the designated catch-all (key `Error` or 500), if any
 *
 * Invariants:
 * - Defaults are seeded only where the application did not register the key.
 * - Route handlers merge top-down after application handlers; on collision the
 *   later (deeper) registration wins.
 * - Catch-all keys never land in `handlers`, so they cannot shadow a specific
 *   handler during lookup.
 */

import { isHttpException } from "../errors/exceptions";
import {
  collectRoutes,
  exceptionHandlerExtractor,
} from "../routing/aggregate";
import type { RouteNode } from "../routing/types";
import type {
  ErrorClass,
  ExceptionHandler,
  ExceptionHandlerMap,
  ExceptionKey,
} from "./types";

export type ResolvedExceptionHandlers = {
  readonly handlers: ReadonlyMap<ExceptionKey, ExceptionHandler>;
  readonly errorHandler?: ExceptionHandler;
};

export function isCatchAllKey(key: ExceptionKey): boolean {
  return key === 500 || key === Error;
}

export function seedDefaultHandlers(
  explicit: ReadonlyMap<ExceptionKey, ExceptionHandler>,
  defaults: ReadonlyArray<readonly [ExceptionKey, ExceptionHandler]>
): ExceptionHandlerMap {
  const out: ExceptionHandlerMap = new Map(explicit);
  for (const [key, handler] of defaults) {
    if (!out.has(key)) out.set(key, handler);
  }
  return out;
}

export function partitionExceptionHandlers(
  map: ReadonlyMap<ExceptionKey, ExceptionHandler>
): ResolvedExceptionHandlers {
  const handlers: ExceptionHandlerMap = new Map();
  let errorHandler: ExceptionHandler | undefined;

  for (const [key, handler] of map) {
    if (isCatchAllKey(key)) errorHandler = handler;
    else handlers.set(key, handler);
  }

  return { handlers, errorHandler };
}

export function buildExceptionHandlers(opts: {
  explicit: ReadonlyMap<ExceptionKey, ExceptionHandler>;
  defaults: ReadonlyArray<readonly [ExceptionKey, ExceptionHandler]>;
  routes: readonly RouteNode[];
}): ResolvedExceptionHandlers {
  const merged = seedDefaultHandlers(opts.explicit, opts.defaults);

  for (const [key, handler] of collectRoutes(
    opts.routes,
    exceptionHandlerExtractor
  )) {
    merged.set(key, handler);
  }

  return partitionExceptionHandlers(merged);
}

/**
 * Most specific handler for `err`:
 * 1) HttpException status code
 * 2) nearest registered class on the error's prototype chain
 */
export function lookupExceptionHandler(
  handlers: ReadonlyMap<ExceptionKey, ExceptionHandler>,
  err: Error
): ExceptionHandler | undefined {
  if (isHttpException(err)) {
    const byStatus = handlers.get(err.status);
    if (byStatus) return byStatus;
  }

  let best: ErrorClass | undefined;
  for (const key of handlers.keys()) {
    if (typeof key === "number" || !(err instanceof key)) continue;
    if (!best || key.prototype instanceof best) best = key;
  }

  return best ? handlers.get(best) : undefined;
}
