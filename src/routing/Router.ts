// src/routing/Router.ts
/**
 * Purpose:
 * - Innermost collaborator of every chain: translates the route tree into an
 *   express.Router and owns the lifespan hooks.
 * - Lifecycle: routes are compiled lazily on first dispatch and recompiled
 *   after addRoute().
 *
 * Standardized:
 *   • async handler wrapping (rejections go to next(err))
 *   • permission guard before the handler body
 *   • a non-undefined return value is sent as JSON
 *
 * Invariants:
 * - Route middleware and exception handlers are NOT applied here; the
 *   application hoists them into its chain.
 * - A nested application is mounted through its `handle`; nothing inside it
 *   is compiled by this router.
 */

import express = require("express");
import type { RequestHandler } from "express";
import type { Application } from "../app/Application";
import { ServiceBase } from "../base/ServiceBase";
import type {
  Lifespan,
  LifespanHook,
  LifespanTeardown,
} from "../config/types";
import { ImproperlyConfigured, PermissionDenied } from "../errors/exceptions";
import type { Dispatch } from "../middleware/types";
import {
  isNestedApplication,
  isRouteNode,
  type Gateway,
  type HttpMethod,
  type Include,
  type Permission,
  type PermissionContext,
  type RouteNode,
} from "./types";

export type RouterOptions = {
  routes?: readonly RouteNode[];
  onStartup?: readonly LifespanHook[];
  onShutdown?: readonly LifespanHook[];
  lifespan?: Lifespan;
  /** Application-level permissions, checked before any route's own. */
  permissions?: readonly Permission[];
  /** When true, "/a/" and "/a" match the same route. */
  redirectSlashes?: boolean;
  service?: string;
};

export class Router extends ServiceBase {
  public readonly routes: RouteNode[] = [];
  public readonly onStartup: LifespanHook[];
  public readonly onShutdown: LifespanHook[];
  public readonly lifespan?: Lifespan;
  public readonly permissions: readonly Permission[];
  public readonly redirectSlashes: boolean;

  #compiled?: express.Router;
  #teardown?: LifespanTeardown;
  #started = false;

  constructor(opts: RouterOptions = {}) {
    super({ service: opts.service, context: { component: "Router" } });

    this.onStartup = [...(opts.onStartup ?? [])];
    this.onShutdown = [...(opts.onShutdown ?? [])];
    this.lifespan = opts.lifespan;
    this.permissions = Object.freeze([...(opts.permissions ?? [])]);
    this.redirectSlashes = opts.redirectSlashes ?? true;

    if (this.lifespan && (this.onStartup.length || this.onShutdown.length)) {
      throw new ImproperlyConfigured(
        "ROUTER_LIFESPAN_CONFLICT: use lifespan or onStartup/onShutdown, not both."
      );
    }

    for (const r of opts.routes ?? []) this.addRoute(r);
  }

  /** Rejects anything that is not a Gateway or Include. */
  public validateRootRouteParent(value: unknown): asserts value is RouteNode {
    if (!isRouteNode(value)) {
      throw new ImproperlyConfigured(
        "ROUTE_INVALID: the router accepts only Gateway or Include nodes."
      );
    }
  }

  public addRoute(value: unknown): void {
    this.validateRootRouteParent(value);
    this.routes.push(value);
    this.#compiled = undefined;
  }

  /** Stable dispatch entry; always runs the current compilation. */
  public readonly handle: Dispatch = (req, res, next) => {
    this.router()(req, res, next);
  };

  public router(): express.Router {
    if (!this.#compiled) {
      this.#compiled = this.compile();
      this.log.debug({ routes: this.routes.length }, "router_compiled");
    }
    return this.#compiled;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Compilation
  // ──────────────────────────────────────────────────────────────────────────

  private newExpressRouter(): express.Router {
    return express.Router({
      strict: !this.redirectSlashes,
      mergeParams: true,
    });
  }

  private compile(): express.Router {
    const r = this.newExpressRouter();
    this.mountNodes(r, this.routes, this.permissions);
    return r;
  }

  private mountNodes(
    target: express.Router,
    nodes: readonly RouteNode[],
    inherited: readonly Permission[]
  ): void {
    for (const node of nodes) {
      if (node.kind === "gateway") this.mountGateway(target, node, inherited);
      else this.mountInclude(target, node, inherited);
    }
  }

  private mountGateway(
    target: express.Router,
    node: Gateway,
    inherited: readonly Permission[]
  ): void {
    const handler = this.wrap(node, [
      ...inherited,
      ...node.permissions,
      ...node.handler.permissions,
    ]);
    const route = target.route(node.path);
    for (const m of node.handler.methods) bindMethod(route, m, handler);
  }

  private mountInclude(
    target: express.Router,
    node: Include,
    inherited: readonly Permission[]
  ): void {
    const permissions = [...inherited, ...node.permissions];

    if (isNestedApplication(node.app)) {
      target.use(node.path, node.app.handle);
      return;
    }
    if (node.app) {
      if (permissions.length) {
        target.use(node.path, this.guard(node, permissions), node.app);
      } else {
        target.use(node.path, node.app);
      }
      return;
    }

    const sub = this.newExpressRouter();
    this.mountNodes(sub, node.routes, permissions);
    target.use(node.path, sub);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Handler wrapping
  // ──────────────────────────────────────────────────────────────────────────

  private guard(node: Include, permissions: readonly Permission[]): RequestHandler {
    const ctx: PermissionContext = { path: node.path, methods: [], name: node.name };
    return (req, _res, next) => {
      checkPermissions(permissions, req, ctx).then(() => next(), next);
    };
  }

  private wrap(node: Gateway, permissions: readonly Permission[]): RequestHandler {
    const log = this.bindLog({ kind: "http", path: node.path });
    const ctx: PermissionContext = {
      path: node.path,
      methods: node.handler.methods,
      name: node.name,
    };
    const fn = node.handler.fn;

    return (req, res, next) => {
      log.debug({ method: req.method, url: req.originalUrl }, "route_enter");

      checkPermissions(permissions, req, ctx)
        .then(() => fn(req, res, next))
        .then((out) => {
          if (out !== undefined && !res.headersSent) res.json(out);
        })
        .catch(next);
    };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifespan
  // ──────────────────────────────────────────────────────────────────────────

  public async startup(app: Application): Promise<void> {
    if (this.#started) return;
    this.#started = true;

    if (this.lifespan) {
      const teardown = await this.lifespan(app);
      this.#teardown = typeof teardown === "function" ? teardown : undefined;
    } else {
      for (const hook of this.onStartup) await hook();
    }
    this.log.info({ event: "startup" }, "router started");
  }

  public async shutdown(): Promise<void> {
    if (!this.#started) return;
    this.#started = false;

    if (this.lifespan) {
      const teardown = this.#teardown;
      this.#teardown = undefined;
      if (teardown) await teardown();
    } else {
      for (const hook of this.onShutdown) await hook();
    }
    this.log.info({ event: "shutdown" }, "router stopped");
  }
}

async function checkPermissions(
  permissions: readonly Permission[],
  req: express.Request,
  ctx: PermissionContext
): Promise<void> {
  for (const p of permissions) {
    if (!(await p.hasPermission(req, ctx))) throw new PermissionDenied();
  }
}

function bindMethod(
  route: express.IRoute,
  method: HttpMethod,
  handler: RequestHandler
): void {
  switch (method) {
    case "GET":
      route.get(handler);
      break;
    case "POST":
      route.post(handler);
      break;
    case "PUT":
      route.put(handler);
      break;
    case "PATCH":
      route.patch(handler);
      break;
    case "DELETE":
      route.delete(handler);
      break;
    case "HEAD":
      route.head(handler);
      break;
    case "OPTIONS":
      route.options(handler);
      break;
  }
}
