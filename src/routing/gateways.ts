// src/routing/gateways.ts
/**
 * Builders for the route tree.
 *
 *   const users = include("/users", {
 *     routes: [gateway("/:id", get(getUser))],
 *     middleware: [audit],
 *   });
 */

import { ImproperlyConfigured } from "../errors/exceptions";
import {
  toHandlerMap,
  type ExceptionHandlersInit,
} from "../exceptions/types";
import type { Middleware } from "../middleware/types";
import {
  HTTP_METHODS,
  isNestedApplication,
  isRouteNode,
  type Gateway,
  type HttpMethod,
  type Include,
  type MountedApp,
  type Permission,
  type RouteHandler,
  type RouteHandlerFn,
  type RouteNode,
} from "./types";

export type LayerOptions = {
  middleware?: readonly Middleware[];
  exceptionHandlers?: ExceptionHandlersInit;
  permissions?: readonly Permission[];
  name?: string;
};

function normalizePath(path: string): string {
  const p = (path ?? "").trim();
  if (!p) return "/";
  if (!p.startsWith("/")) {
    throw new ImproperlyConfigured(
      `ROUTE_PATH_INVALID: path "${p}" must start with "/".`
    );
  }
  return p;
}

function layers(opts: LayerOptions) {
  return {
    middleware: Object.freeze([...(opts.middleware ?? [])]),
    exceptionHandlers: toHandlerMap(opts.exceptionHandlers),
    permissions: Object.freeze([...(opts.permissions ?? [])]),
    name: opts.name,
  };
}

export function handler(
  methods: HttpMethod | readonly HttpMethod[],
  fn: RouteHandlerFn,
  opts: LayerOptions = {}
): RouteHandler {
  const list = typeof methods === "string" ? [methods] : [...methods];
  if (!list.length) {
    throw new ImproperlyConfigured(
      `HANDLER_METHODS_EMPTY: handler "${opts.name ?? fn.name}" declares no HTTP methods.`
    );
  }
  for (const m of list) {
    if (!HTTP_METHODS.includes(m)) {
      throw new ImproperlyConfigured(`HANDLER_METHOD_INVALID: "${m}".`);
    }
  }
  return Object.freeze({
    kind: "handler" as const,
    methods: Object.freeze(list),
    fn,
    ...layers({ ...opts, name: opts.name ?? (fn.name || undefined) }),
  });
}

export const get = (fn: RouteHandlerFn, opts?: LayerOptions) =>
  handler("GET", fn, opts);
export const post = (fn: RouteHandlerFn, opts?: LayerOptions) =>
  handler("POST", fn, opts);
export const put = (fn: RouteHandlerFn, opts?: LayerOptions) =>
  handler("PUT", fn, opts);
export const patch = (fn: RouteHandlerFn, opts?: LayerOptions) =>
  handler("PATCH", fn, opts);
export const del = (fn: RouteHandlerFn, opts?: LayerOptions) =>
  handler("DELETE", fn, opts);

export function gateway(
  path: string,
  routeHandler: RouteHandler,
  opts: LayerOptions = {}
): Gateway {
  return Object.freeze({
    kind: "gateway" as const,
    path: normalizePath(path),
    handler: routeHandler,
    ...layers({ ...opts, name: opts.name ?? routeHandler.name }),
  });
}

export type IncludeOptions = LayerOptions & {
  routes?: readonly RouteNode[];
  app?: MountedApp;
};

export function include(path: string, opts: IncludeOptions = {}): Include {
  const routes = [...(opts.routes ?? [])];
  if (opts.app && routes.length) {
    throw new ImproperlyConfigured(
      `INCLUDE_AMBIGUOUS: include "${path}" declares both an app and routes. Use one.`
    );
  }
  for (const r of routes) {
    if (!isRouteNode(r)) {
      throw new ImproperlyConfigured(
        `INCLUDE_ROUTE_INVALID: include "${path}" contains a value that is not a Gateway or Include.`
      );
    }
  }
  if (isNestedApplication(opts.app) && opts.middleware?.length) {
    throw new ImproperlyConfigured(
      `INCLUDE_BOUNDARY_MIDDLEWARE: include "${path}" mounts an application; declare middleware on that application instead.`
    );
  }
  return Object.freeze({
    kind: "include" as const,
    path: normalizePath(path),
    routes: Object.freeze(routes),
    app: opts.app,
    ...layers(opts),
  });
}
