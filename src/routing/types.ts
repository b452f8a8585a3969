// src/routing/types.ts
/**
 * Purpose:
 * - Route tree model. A RouteNode is either an Include (sub-tree or mounted
 *   app) or a Gateway (leaf binding a path to one RouteHandler).
 *
 * Invariants:
 * - Nodes are frozen once built; aggregation passes only read them.
 * - An Include whose `app` is a NestedApplication is an opaque boundary: its
 *   own stacks are built by that application, never by the parent.
 */

import type {
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import type { Middleware } from "../middleware/types";
import type { ExceptionHandlerMap } from "../exceptions/types";

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Handler body. A non-undefined return value is sent as JSON when the
 * handler has not already responded.
 */
export type RouteHandlerFn = (
  req: Request,
  res: Response,
  next: NextFunction
) => unknown;

export type PermissionContext = {
  path: string;
  methods: readonly HttpMethod[];
  name?: string;
};

export interface Permission {
  hasPermission(
    req: Request,
    route: PermissionContext
  ): boolean | Promise<boolean>;
}

export function isPermission(x: unknown): x is Permission {
  return (
    !!x &&
    typeof x === "object" &&
    "hasPermission" in x &&
    typeof x.hasPermission === "function"
  );
}

/** Capability a mounted child application exposes to its parent. */
export interface NestedApplication {
  readonly isApplicationBoundary: true;
  readonly handle: RequestHandler;
}

export type MountedApp = NestedApplication | RequestHandler;

type RouteLayers = {
  readonly middleware: readonly Middleware[];
  readonly exceptionHandlers: ExceptionHandlerMap;
  readonly permissions: readonly Permission[];
  readonly name?: string;
};

export interface RouteHandler extends RouteLayers {
  readonly kind: "handler";
  readonly methods: readonly HttpMethod[];
  readonly fn: RouteHandlerFn;
}

export interface Gateway extends RouteLayers {
  readonly kind: "gateway";
  readonly path: string;
  readonly handler: RouteHandler;
}

export interface Include extends RouteLayers {
  readonly kind: "include";
  readonly path: string;
  readonly routes: readonly RouteNode[];
  readonly app?: MountedApp;
}

export type RouteNode = Gateway | Include;

export function isNestedApplication(
  app: MountedApp | undefined
): app is NestedApplication {
  return !!app && typeof app !== "function" && app.isApplicationBoundary;
}

/** True when an Include mounts a child application (opaque boundary). */
export function isApplicationBoundary(node: RouteNode): boolean {
  return node.kind === "include" && isNestedApplication(node.app);
}

export function isRouteNode(x: unknown): x is RouteNode {
  if (!x || typeof x !== "object" || !("kind" in x)) return false;
  return x.kind === "gateway" || x.kind === "include";
}
