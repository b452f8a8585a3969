// src/middleware/stackBuilder.ts
/**
 * Purpose:
 * - Assemble the application's middleware chain and wrap it around the router.
 *
 * Order (outer → inner):
 *   errorBoundary
 *   → trustedHost? → cors? → csrf? → session?        (built-ins, when configured)
 *   → declared middleware                           (application, in order)
 *   → route-contributed middleware                  (tree walk, in order)
 *   → exceptionMiddleware → asyncExitStack
 *   → router
 *
 * Invariants:
 * - Exactly one errorBoundary and one exceptionMiddleware per chain.
 * - Building is pure: same inputs, same chain; nothing is appended to the
 *   configuration record.
 */

import type { AppConfig } from "../config/appConfig";
import type { IBoundLogger } from "../logger/Logger";
import type { ProblemFactory } from "../problem/problem";
import type { ResolvedExceptionHandlers } from "../exceptions/handlerRegistry";
import { collectRoutes, middlewareExtractor } from "../routing/aggregate";
import type { RouteNode } from "../routing/types";
import { asyncExitStackMiddleware } from "./asyncExitStack";
import { corsMiddleware } from "./cors";
import { csrfMiddleware } from "./csrf";
import { errorBoundaryMiddleware, exceptionMiddleware } from "./exceptions";
import { sessionMiddleware } from "./session";
import { trustedHostMiddleware } from "./trustedHost";
import {
  defineMiddleware,
  toMiddlewareSpec,
  type Dispatch,
  type MiddlewareSpec,
} from "./types";

type BuiltinConfig = Pick<
  AppConfig,
  "allowedHosts" | "corsConfig" | "csrfConfig" | "sessionConfig"
>;

export function buildBuiltinMiddleware(config: BuiltinConfig): MiddlewareSpec[] {
  const out: MiddlewareSpec[] = [];

  if (config.allowedHosts.length) {
    out.push(
      defineMiddleware(trustedHostMiddleware, {
        allowedHosts: config.allowedHosts,
      })
    );
  }
  if (config.corsConfig) {
    out.push(defineMiddleware(corsMiddleware, config.corsConfig));
  }
  if (config.csrfConfig) {
    out.push(defineMiddleware(csrfMiddleware, config.csrfConfig));
  }
  if (config.sessionConfig) {
    out.push(defineMiddleware(sessionMiddleware, config.sessionConfig));
  }

  return out;
}

/** Built-ins, then declared middleware, then route-contributed middleware. */
export function buildUserMiddleware(
  config: BuiltinConfig & Pick<AppConfig, "middleware">,
  routes: readonly RouteNode[]
): MiddlewareSpec[] {
  const fromRoutes = collectRoutes(routes, middlewareExtractor);
  return [
    ...buildBuiltinMiddleware(config),
    ...[...config.middleware, ...fromRoutes].map(toMiddlewareSpec),
  ];
}

export function buildMiddlewareChain(opts: {
  userMiddleware: readonly MiddlewareSpec[];
  exceptionHandlers: ResolvedExceptionHandlers;
  debug: boolean;
  log: IBoundLogger;
  problems: ProblemFactory;
}): MiddlewareSpec[] {
  const { handlers, errorHandler } = opts.exceptionHandlers;

  return [
    defineMiddleware(errorBoundaryMiddleware, {
      handlers,
      errorHandler,
      debug: opts.debug,
      log: opts.log,
      problems: opts.problems,
    }),
    ...opts.userMiddleware,
    defineMiddleware(exceptionMiddleware, {
      handlers,
      errorHandler,
      debug: opts.debug,
      log: opts.log,
    }),
    defineMiddleware(asyncExitStackMiddleware, { log: opts.log }),
  ];
}

/** Wrap innermost-first: the last spec wraps the router directly. */
export function wrapChain(
  chain: readonly MiddlewareSpec[],
  router: Dispatch
): Dispatch {
  let app = router;
  for (let i = chain.length - 1; i >= 0; i--) {
    app = chain[i].wrap(app);
  }
  return app;
}
