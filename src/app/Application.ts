// src/app/Application.ts
/**
 * Purpose:
 * - Composition root. Holds every build-time decision so dispatch never
 *   re-reads configuration.
 *
 * Construction:
 *   settings → merged config → router → static-file includes
 *   → exception handlers → user middleware → chain → scheduler
 *
 * Invariants:
 * - Every mutation (addRoute, addInclude, addRouter, addMiddleware,
 *   addExceptionHandler) derives a fresh config where needed and rebuilds the
 *   handler map and the whole chain. Rebuilding twice yields the same chain.
 * - `handle` is stable for the lifetime of the instance; it always runs the
 *   latest build.
 * - Mounted inside another application, this instance is opaque: the parent
 *   contributes no middleware to it and only sees its handle.
 */

import type { Express, RequestHandler } from "express";
import express = require("express");
import type { Server } from "node:http";
import { ServiceBase } from "../base/ServiceBase";
import { mergeAppConfig, type AppConfig, type AppOptions } from "../config/appConfig";
import {
  parseSettings,
  type AppSettings,
  type AppSettingsInput,
} from "../config/settings";
import type { StaticFilesConfig } from "../config/types";
import { ImproperlyConfigured } from "../errors/exceptions";
import { defaultExceptionHandlers } from "../exceptions/defaultHandlers";
import {
  buildExceptionHandlers,
  type ResolvedExceptionHandlers,
} from "../exceptions/handlerRegistry";
import {
  describeKey,
  isExceptionKey,
  type ExceptionHandler,
  type ExceptionKey,
} from "../exceptions/types";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  buildMiddlewareChain,
  buildUserMiddleware,
  wrapChain,
} from "../middleware/stackBuilder";
import {
  isMiddleware,
  type Dispatch,
  type Middleware,
  type MiddlewareSpec,
} from "../middleware/types";
import {
  createNotFoundHandler,
  createProblemMiddleware,
} from "../problem/createProblemMiddleware";
import { ProblemFactory } from "../problem/problem";
import { gateway, include, type LayerOptions } from "../routing/gateways";
import { Router } from "../routing/Router";
import type {
  Include,
  NestedApplication,
  RouteHandler,
  RouteNode,
} from "../routing/types";
import { Scheduler } from "../scheduler/Scheduler";

export type ApplicationOptions = AppOptions & {
  routes?: readonly RouteNode[];
  /** Defaults for every option not given explicitly. */
  settings?: AppSettingsInput;
};

type Built = {
  exceptionHandlers: ResolvedExceptionHandlers;
  userMiddleware: readonly MiddlewareSpec[];
  middlewareChain: readonly MiddlewareSpec[];
  dispatch: Dispatch;
};

function staticInclude(cfg: StaticFilesConfig): Include {
  return include(cfg.path, {
    app: express.static(cfg.directory, {
      maxAge: cfg.maxAge ?? 0,
      ...(cfg.index === false ? { index: false } : {}),
    }),
    name: `static:${cfg.path}`,
  });
}

export class Application extends ServiceBase implements NestedApplication {
  public readonly isApplicationBoundary = true as const;

  public readonly settings: AppSettings;
  public readonly router: Router;
  public readonly scheduler?: Scheduler;
  /** Application-wide state, exposed to handlers as res.locals.state. */
  public readonly state = new Map<string, unknown>();

  #config: AppConfig;
  #built: Built;
  #instance?: Express;
  readonly #problems: ProblemFactory;

  constructor(opts: ApplicationOptions = {}) {
    const settings = parseSettings(opts.settings);
    const config = mergeAppConfig(opts, settings);

    super({ service: config.appName || config.title });

    this.settings = settings;
    this.#config = config;
    this.#problems = new ProblemFactory({
      app: config.title || config.appName || "ashlar",
      appVersion: config.version,
    });

    this.router = new Router({
      routes: opts.routes,
      onStartup: config.onStartup,
      onShutdown: config.onShutdown,
      lifespan: config.lifespan,
      permissions: config.permissions,
      redirectSlashes: config.redirectSlashes,
      service: this.service,
    });

    for (const cfg of config.staticFilesConfig) {
      this.router.addRoute(staticInclude(cfg));
    }

    this.#built = this.build();

    if (config.enableScheduler) {
      this.scheduler = new Scheduler({
        tasks: config.schedulerTasks,
        configurations: config.schedulerConfigurations,
        service: this.service,
      });
    }

    this.log.info(
      {
        event: "app_constructed",
        title: config.title,
        version: config.version,
        debug: config.debug,
        routes: this.router.routes.length,
        middleware: this.#built.userMiddleware.map((m) => m.name),
      },
      "application constructed"
    );
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Build
  // ──────────────────────────────────────────────────────────────────────────

  private build(): Built {
    const config = this.#config;
    const routes = this.router.routes;

    const exceptionHandlers = buildExceptionHandlers({
      explicit: config.exceptionHandlers,
      defaults: defaultExceptionHandlers(this.#problems),
      routes,
    });
    const userMiddleware = buildUserMiddleware(config, routes);
    const middlewareChain = buildMiddlewareChain({
      userMiddleware,
      exceptionHandlers,
      debug: config.debug,
      log: this.log,
      problems: this.#problems,
    });

    return {
      exceptionHandlers,
      userMiddleware,
      middlewareChain,
      dispatch: wrapChain(middlewareChain, this.router.handle),
    };
  }

  /** Full rebuild of the handler map and the chain. */
  public rebuild(): void {
    this.#built = this.build();
    this.log.debug(
      {
        event: "app_rebuilt",
        middleware: this.#built.userMiddleware.map((m) => m.name),
      },
      "middleware stack rebuilt"
    );
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Dispatch
  // ──────────────────────────────────────────────────────────────────────────

  public readonly handle: RequestHandler = (req, res, next) => {
    res.locals.rootPath = this.#config.rootPath;
    res.locals.state = this.state;
    this.#built.dispatch(req, res, next);
  };

  /** Express app serving this application, with the final error funnel. */
  public get instance(): Express {
    if (this.#instance) return this.#instance;

    const app = express();
    app.disable("x-powered-by");
    if (this.#config.logRequests) {
      app.use(makeHttpLogger(this.#config.appName));
    }
    if (this.#config.rootPath) app.use(this.#config.rootPath, this.handle);
    else app.use(this.handle);
    app.use(createNotFoundHandler(this.#problems));
    app.use(createProblemMiddleware({ log: this.log, problems: this.#problems }));

    this.#instance = app;
    return app;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Mutations
  // ──────────────────────────────────────────────────────────────────────────

  public addRoute(
    path: string,
    handler: RouteHandler,
    opts: LayerOptions = {}
  ): void {
    this.router.addRoute(gateway(path, handler, opts));
    this.rebuild();
  }

  public addInclude(node: Include): void {
    this.router.addRoute(node);
    this.rebuild();
  }

  /** Copies the router's routes and appends its startup/shutdown hooks. */
  public addRouter(router: Router): void {
    if (router.lifespan) {
      throw new ImproperlyConfigured(
        "ROUTER_LIFESPAN_UNSUPPORTED: an added router cannot carry a lifespan; use onStartup/onShutdown."
      );
    }
    if (
      this.router.lifespan &&
      (router.onStartup.length || router.onShutdown.length)
    ) {
      throw new ImproperlyConfigured(
        "ROUTER_LIFESPAN_CONFLICT: this application uses lifespan; the added router declares onStartup/onShutdown hooks."
      );
    }

    for (const route of router.routes) this.router.addRoute(route);
    this.router.onStartup.push(...router.onStartup);
    this.router.onShutdown.push(...router.onShutdown);
    this.rebuild();
  }

  public addMiddleware(middleware: Middleware): void {
    if (!isMiddleware(middleware)) {
      throw new ImproperlyConfigured(
        "MIDDLEWARE_INVALID: expected a MiddlewareSpec or a request handler."
      );
    }
    this.#config = Object.freeze({
      ...this.#config,
      middleware: [...this.#config.middleware, middleware],
    });
    this.rebuild();
  }

  public addExceptionHandler(key: ExceptionKey, handler: ExceptionHandler): void {
    if (!isExceptionKey(key)) {
      throw new ImproperlyConfigured(
        "EXCEPTION_KEY_INVALID: expected an Error subclass or an HTTP status code."
      );
    }
    const exceptionHandlers = new Map(this.#config.exceptionHandlers);
    exceptionHandlers.set(key, handler);
    this.#config = Object.freeze({ ...this.#config, exceptionHandlers });
    this.log.debug({ key: describeKey(key) }, "exception handler added");
    this.rebuild();
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Unsupported shorthands
  // ──────────────────────────────────────────────────────────────────────────

  public mount(_path: string, _app?: unknown): never {
    throw new ImproperlyConfigured(
      "`mount` is not supported. Use include(path, { app }) instead."
    );
  }

  public host(_host: string, _app?: unknown): never {
    throw new ImproperlyConfigured(
      "`host` is not supported. Use allowedHosts or an include instead."
    );
  }

  public route(_path: string): never {
    throw new ImproperlyConfigured("`route` is not valid. Use gateway() instead.");
  }

  public websocketRoute(_path: string): never {
    throw new ImproperlyConfigured("`websocketRoute` is not supported.");
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────────────────────────────

  public async startup(): Promise<void> {
    await this.router.startup(this);
    this.scheduler?.start();
    this.log.info({ event: "app_started" }, "application started");
  }

  public async shutdown(): Promise<void> {
    this.scheduler?.stop();
    await this.router.shutdown();
    this.log.info({ event: "app_stopped" }, "application stopped");
  }

  /** Runs startup(), then serves `instance`; shutdown() runs on close. */
  public async listen(port: number, host = "0.0.0.0"): Promise<Server> {
    await this.startup();

    const server = await new Promise<Server>((resolve, reject) => {
      const s = this.instance.listen(port, host, () => resolve(s));
      s.once("error", reject);
    });

    server.once("close", () => {
      this.shutdown().catch((err: unknown) => {
        this.log.error(
          { event: "shutdown_failed", error: this.log.serializeError(err) },
          "application shutdown failed"
        );
      });
    });

    this.log.info({ event: "listening", port, host }, "application listening");
    return server;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Read-only views
  // ──────────────────────────────────────────────────────────────────────────

  public get config(): AppConfig {
    return this.#config;
  }

  public get debug(): boolean {
    return this.#config.debug;
  }

  public get routes(): readonly RouteNode[] {
    return this.router.routes;
  }

  public get userMiddleware(): readonly MiddlewareSpec[] {
    return this.#built.userMiddleware;
  }

  public get middlewareChain(): readonly MiddlewareSpec[] {
    return this.#built.middlewareChain;
  }

  public get exceptionHandlers(): ResolvedExceptionHandlers["handlers"] {
    return this.#built.exceptionHandlers.handlers;
  }

  public get errorHandler(): ExceptionHandler | undefined {
    return this.#built.exceptionHandlers.errorHandler;
  }

  public get problems(): ProblemFactory {
    return this.#problems;
  }
}

/** An application mounted inside another; same behavior, distinct kind. */
export class ChildApplication extends Application {}
