// src/middleware/types.ts
/**
 * Purpose:
 * - Middleware contract for the composed chain.
 * - A layer is a `Dispatch` (Express request handler shape). A middleware is a
 *   factory that wraps an inner Dispatch with bound options; the pair is a
 *   MiddlewareSpec.
 *
 * Invariants:
 * - Specs are frozen; the chain never mutates them.
 * - Plain Express request handlers are accepted anywhere a Middleware is, and
 *   adapted through fromRequestHandler().
 */

import type {
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";

export type Dispatch = (req: Request, res: Response, next: NextFunction) => void;

export type MiddlewareFactory<O> = (app: Dispatch, options: O) => Dispatch;

export interface MiddlewareSpec {
  readonly name: string;
  readonly factory: MiddlewareFactory<never>;
  readonly options: unknown;
  wrap(app: Dispatch): Dispatch;
}

/** What callers may declare: a spec, or a bare Express handler. */
export type Middleware = MiddlewareSpec | RequestHandler;

export function defineMiddleware<O>(
  factory: MiddlewareFactory<O>,
  options: O,
  name: string = factory.name || "middleware"
): MiddlewareSpec {
  return Object.freeze({
    name,
    factory,
    options,
    wrap: (app: Dispatch) => factory(app, options),
  });
}

export function isMiddlewareSpec(x: unknown): x is MiddlewareSpec {
  return (
    !!x &&
    typeof x === "object" &&
    "wrap" in x &&
    typeof x.wrap === "function" &&
    "factory" in x &&
    typeof x.factory === "function"
  );
}

export function isMiddleware(x: unknown): x is Middleware {
  return typeof x === "function" || isMiddlewareSpec(x);
}

/** `next("route")` and `next("router")` are routing signals, not errors. */
export function isRoutingSignal(err: unknown): boolean {
  return err === "route" || err === "router";
}

export function requestHandlerMiddleware(
  app: Dispatch,
  options: { handler: RequestHandler }
): Dispatch {
  const { handler } = options;

  return (req, res, next) => {
    let proceeded = false;

    const proceed: NextFunction = (err?: unknown) => {
      if (proceeded) return;
      proceeded = true;
      if (err !== undefined && err !== null && !isRoutingSignal(err)) {
        next(err);
        return;
      }
      app(req, res, next);
    };

    try {
      const out: unknown = handler(req, res, proceed);
      if (out instanceof Promise) out.catch(next);
    } catch (err) {
      next(err);
    }
  };
}

export function fromRequestHandler(handler: RequestHandler): MiddlewareSpec {
  return defineMiddleware(
    requestHandlerMiddleware,
    { handler },
    handler.name || "requestHandler"
  );
}

export function toMiddlewareSpec(m: Middleware): MiddlewareSpec {
  return isMiddlewareSpec(m) ? m : fromRequestHandler(m);
}
