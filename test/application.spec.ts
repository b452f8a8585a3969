// test/application.spec.ts
import type { RequestHandler } from "express";
import request from "supertest";
import { describe, it, expect, vi } from "vitest";
import { Application, ChildApplication } from "../src/app/Application";
import {
  HttpException,
  ImproperlyConfigured,
  NotFound,
  PermissionDenied,
  ValidationErrorException,
} from "../src/errors/exceptions";
import type { ExceptionHandler } from "../src/exceptions/types";
import { gateway, get, include, post } from "../src/routing/gateways";
import { Router } from "../src/routing/Router";
import type { Permission } from "../src/routing/types";

/** Middleware that stamps a response header, named after it. */
function mark(header: string): RequestHandler {
  const fn: RequestHandler = (_req, res, next) => {
    res.setHeader(header, "1");
    next();
  };
  Object.defineProperty(fn, "name", { value: header });
  return fn;
}

function respondWith(status: number, by: string): ExceptionHandler {
  return (_err, _req, res) => {
    res.status(status).json({ by });
  };
}

describe("Application: construction", () => {
  it("fails on allowOrigins plus corsConfig before any route is registered", () => {
    const routes = [gateway("/", get(() => "never"))];
    expect(
      () =>
        new Application({
          allowOrigins: ["https://web.test"],
          corsConfig: { allowOrigins: ["https://other.test"] },
          routes,
        })
    ).toThrow(ImproperlyConfigured);
  });

  it("fails on lifespan plus startup hooks", () => {
    expect(
      () =>
        new Application({
          lifespan: () => undefined,
          onStartup: [() => undefined],
        })
    ).toThrow(ImproperlyConfigured);
  });

  it("fails on invalid settings", () => {
    expect(() => new Application({ settings: { rootPath: "no-slash" } })).toThrow(
      /SETTINGS_INVALID/
    );
  });

  it("orders declared middleware before route middleware: [M0, M1]", () => {
    const app = new Application({
      middleware: [mark("M0")],
      routes: [
        gateway("/one", get(() => 1), { middleware: [mark("M1")] }),
        gateway("/two", get(() => 2)),
      ],
    });

    expect(app.userMiddleware.map((m) => m.name)).toEqual(["M0", "M1"]);
  });

  it("brackets user middleware with exactly one boundary each side", () => {
    for (const count of [0, 1, 4]) {
      const middleware = Array.from({ length: count }, (_, i) => mark(`m${i}`));
      const names = new Application({ middleware }).middlewareChain.map(
        (m) => m.name
      );

      expect(names.filter((n) => n === "errorBoundaryMiddleware")).toHaveLength(1);
      expect(names.filter((n) => n === "exceptionMiddleware")).toHaveLength(1);
      expect(names[0]).toBe("errorBoundaryMiddleware");
      expect(names.slice(-2)).toEqual([
        "exceptionMiddleware",
        "asyncExitStackMiddleware",
      ]);
    }
  });

  it("registers the default handlers", () => {
    const app = new Application();
    expect(app.exceptionHandlers.has(ImproperlyConfigured)).toBe(true);
    expect(app.exceptionHandlers.has(ValidationErrorException)).toBe(true);
    expect(app.errorHandler).toBeUndefined();
  });

  it("builds a scheduler only when enabled", () => {
    const tasks = { tick: { everyMs: 1000, run: () => undefined } };
    expect(new Application({ schedulerTasks: tasks }).scheduler).toBeUndefined();
    expect(
      new Application({ enableScheduler: true, schedulerTasks: tasks }).scheduler?.taskNames()
    ).toEqual(["tick"]);
  });

  it("keeps ChildApplication a plain Application", () => {
    const child = new ChildApplication({ title: "child" });
    expect(child).toBeInstanceOf(Application);
    expect(child.isApplicationBoundary).toBe(true);
    expect(child.config.title).toBe("child");
  });

  it("rejects the unsupported shorthands", () => {
    const app = new Application();
    expect(() => app.mount("/x")).toThrow(ImproperlyConfigured);
    expect(() => app.host("api.test")).toThrow(ImproperlyConfigured);
    expect(() => app.route("/x")).toThrow(/Use gateway\(\) instead/);
    expect(() => app.websocketRoute("/ws")).toThrow(ImproperlyConfigured);
  });
});

describe("Application: dispatch", () => {
  it("sends a handler's return value as JSON", async () => {
    const app = new Application({
      routes: [gateway("/hello", get(() => ({ hello: "world" })))],
    });

    const res = await request(app.instance).get("/hello");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ hello: "world" });
  });

  it("reuses an inbound request id", async () => {
    const app = new Application({
      routes: [gateway("/id", get(() => ({ ok: true })))],
    });
    const res = await request(app.instance).get("/id").set("x-request-id", "req-7");
    expect(res.headers["x-request-id"]).toBe("req-7");
  });

  it("answers unknown routes with a 404 problem", async () => {
    const app = new Application({ title: "shop" });
    const res = await request(app.instance).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: "No route for GET /nope",
      app: "shop",
    });
  });

  it("resolves an error to the deepest registered handler", async () => {
    const app = new Application({
      exceptionHandlers: [[404, respondWith(404, "app")]],
      routes: [
        include("/orders", {
          exceptionHandlers: [[404, respondWith(404, "include")]],
          routes: [
            gateway(
              "/:id",
              get(
                () => {
                  throw new NotFound("no such order");
                },
                { exceptionHandlers: [[404, respondWith(404, "handler")]] }
              )
            ),
          ],
        }),
      ],
    });

    const res = await request(app.instance).get("/orders/42");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ by: "handler" });
  });

  it("renders ValidationErrorException through the default handler", async () => {
    const app = new Application({
      title: "shop",
      version: "1.2.3",
      routes: [
        gateway(
          "/items",
          post(() => {
            throw new ValidationErrorException("bad input", [
              { path: "name", message: "required" },
            ]);
          })
        ),
      ],
    });

    const res = await request(app.instance)
      .post("/items")
      .set("x-request-id", "req-400");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      app: "shop",
      appVersion: "1.2.3",
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      code: "VALIDATION_ERROR",
      detail: "bad input",
      errors: [{ path: "name", message: "required" }],
      requestId: "req-400",
    });
  });

  it("renders ImproperlyConfigured raised at dispatch as 500", async () => {
    const app = new Application({
      routes: [
        gateway(
          "/broken",
          get(() => {
            throw new ImproperlyConfigured("MISSING_KEY:", "set PAYMENTS_KEY");
          })
        ),
      ],
    });

    const res = await request(app.instance).get("/broken");

    expect(res.status).toBe(500);
    expect(res.body.code).toBe("IMPROPERLY_CONFIGURED");
    expect(res.body.title).toBe("Improperly Configured");
    expect(res.body.detail).toBe("MISSING_KEY: set PAYMENTS_KEY");
  });

  it("lets the final funnel honor an unhandled HttpException status", async () => {
    const app = new Application({
      routes: [
        gateway(
          "/admin",
          get(() => {
            throw new PermissionDenied();
          })
        ),
      ],
    });

    const res = await request(app.instance).get("/admin");

    expect(res.status).toBe(403);
    expect(res.body).toMatchObject({
      status: 403,
      title: "Forbidden",
      code: "PERMISSION_DENIED",
      detail: "You do not have permission to perform this action",
    });
  });

  it("turns an unhandled error into a generic 500 outside debug", async () => {
    const app = new Application({
      title: "shop",
      routes: [
        gateway(
          "/boom",
          get(async () => {
            throw new Error("secret internals");
          })
        ),
      ],
    });

    const res = await request(app.instance)
      .get("/boom")
      .set("x-request-id", "req-500");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      app: "shop",
      appVersion: "0.1.0",
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: "An unexpected error occurred.",
      requestId: "req-500",
    });
  });

  it("renders unhandled errors with their stack in debug", async () => {
    const app = new Application({
      debug: true,
      routes: [
        gateway(
          "/boom",
          get(() => {
            throw new Error("kaboom");
          })
        ),
      ],
    });

    const res = await request(app.instance)
      .get("/boom")
      .set("x-request-id", "req-debug");

    expect(res.status).toBe(500);
    expect(res.body.detail).toBe("kaboom");
    expect(res.body.code).toBe("INTERNAL_ERROR");
    expect(res.body.requestId).toBe("req-debug");
    expect(res.body.meta.name).toBe("Error");
    expect(res.body.meta.stack[0]).toBe("Error: kaboom");
  });

  it("sends unmatched errors to the designated error handler", async () => {
    const catchAll: ExceptionHandler = (err, _req, res) => {
      res.status(503).json({ caught: err.message });
    };
    const app = new Application({
      exceptionHandlers: [[Error, catchAll]],
      routes: [
        gateway(
          "/fail",
          get(() => {
            throw new TypeError("wrong type");
          })
        ),
        gateway(
          "/invalid",
          get(() => {
            throw new ValidationErrorException("still specific");
          })
        ),
      ],
    });

    expect(app.errorHandler).toBe(catchAll);
    expect(app.exceptionHandlers.has(Error)).toBe(false);

    const fail = await request(app.instance).get("/fail");
    expect(fail.status).toBe(503);
    expect(fail.body).toEqual({ caught: "wrong type" });

    const invalid = await request(app.instance).get("/invalid");
    expect(invalid.status).toBe(400);
    expect(invalid.body.detail).toBe("still specific");
  });

  it("enforces application and route permissions", async () => {
    const adminOnly: Permission = {
      hasPermission: (req) => req.headers["x-role"] === "admin",
    };
    const denyAll: Permission = { hasPermission: async () => false };

    const app = new Application({
      permissions: [adminOnly],
      routes: [
        gateway("/report", get(() => ({ report: true }))),
        gateway("/vault", get(() => ({ vault: true }), { permissions: [denyAll] })),
      ],
    });

    const anon = await request(app.instance).get("/report");
    expect(anon.status).toBe(403);
    expect(anon.body.code).toBe("PERMISSION_DENIED");

    const admin = await request(app.instance).get("/report").set("x-role", "admin");
    expect(admin.status).toBe(200);
    expect(admin.body).toEqual({ report: true });

    const vault = await request(app.instance).get("/vault").set("x-role", "admin");
    expect(vault.status).toBe(403);
  });

  it("serves under rootPath", async () => {
    const app = new Application({
      rootPath: "/api",
      routes: [
        gateway(
          "/where",
          get((_req, res) => ({ rootPath: res.locals.rootPath }))
        ),
      ],
    });

    const hit = await request(app.instance).get("/api/where");
    expect(hit.status).toBe(200);
    expect(hit.body).toEqual({ rootPath: "/api" });

    const miss = await request(app.instance).get("/where");
    expect(miss.status).toBe(404);
  });

  it("exposes application state to handlers", async () => {
    const app = new Application({
      routes: [
        gateway(
          "/greeting",
          get((_req, res) => ({ greeting: res.locals.state.get("greeting") }))
        ),
      ],
    });
    app.state.set("greeting", "hello");

    const res = await request(app.instance).get("/greeting");
    expect(res.body).toEqual({ greeting: "hello" });
  });
});

describe("Application: nested applications", () => {
  function build() {
    const child = new ChildApplication({
      title: "child",
      middleware: [mark("x-child")],
      exceptionHandlers: [[409, respondWith(409, "child")]],
      routes: [
        gateway("/x", get(() => ({ from: "child" }))),
        gateway(
          "/conflict",
          get(() => {
            throw new HttpException(409, { detail: "taken" });
          })
        ),
      ],
    });
    const parent = new Application({
      title: "parent",
      middleware: [mark("x-parent")],
      routes: [
        include("/child", { app: child }),
        gateway("/p", get(() => ({ from: "parent" }))),
      ],
    });
    return { child, parent };
  }

  it("keeps the child's middleware and handlers out of the parent", () => {
    const { parent } = build();
    expect(parent.userMiddleware.map((m) => m.name)).toEqual(["x-parent"]);
    expect(parent.exceptionHandlers.has(409)).toBe(false);
  });

  it("dispatches into the child through its own chain", async () => {
    const { parent } = build();

    const res = await request(parent.instance).get("/child/x");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ from: "child" });
    expect(res.headers["x-parent"]).toBe("1");
    expect(res.headers["x-child"]).toBe("1");

    const own = await request(parent.instance).get("/p");
    expect(own.body).toEqual({ from: "parent" });
    expect(own.headers["x-child"]).toBeUndefined();
  });

  it("handles the child's errors with the child's handlers", async () => {
    const { parent } = build();
    const res = await request(parent.instance).get("/child/conflict");
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ by: "child" });
  });
});

describe("Application: mutations", () => {
  it("addRoute rebuilds and hoists the route's middleware", async () => {
    const app = new Application({ middleware: [mark("x-base")] });
    app.addRoute("/late", get(() => ({ late: true })), {
      middleware: [mark("x-late")],
    });

    expect(app.userMiddleware.map((m) => m.name)).toEqual(["x-base", "x-late"]);

    const res = await request(app.instance).get("/late");
    expect(res.body).toEqual({ late: true });
    expect(res.headers["x-late"]).toBe("1");
  });

  it("addInclude mounts a sub-tree", async () => {
    const app = new Application();
    app.addInclude(
      include("/v1", { routes: [gateway("/ping", get(() => ({ pong: 1 })))] })
    );
    const res = await request(app.instance).get("/v1/ping");
    expect(res.body).toEqual({ pong: 1 });
  });

  it("addMiddleware derives a new config and rebuilds", () => {
    const app = new Application({ middleware: [mark("a")] });
    const before = app.config;

    app.addMiddleware(mark("b"));

    expect(before.middleware).toHaveLength(1);
    expect(app.config).not.toBe(before);
    expect(app.userMiddleware.map((m) => m.name)).toEqual(["a", "b"]);
  });

  it("addExceptionHandler takes effect on the next request", async () => {
    const app = new Application({
      routes: [
        gateway(
          "/tea",
          get(() => {
            throw new HttpException(418);
          })
        ),
      ],
    });
    app.addExceptionHandler(418, respondWith(418, "teapot"));

    const res = await request(app.instance).get("/tea");
    expect(res.status).toBe(418);
    expect(res.body).toEqual({ by: "teapot" });
  });

  it("rejects an invalid exception key", () => {
    const app = new Application();
    expect(() => app.addExceptionHandler(42, respondWith(500, "x"))).toThrow(
      /EXCEPTION_KEY_INVALID/
    );
  });

  it("rebuilds idempotently", () => {
    const app = new Application({
      middleware: [mark("a")],
      routes: [gateway("/", get(() => 1), { middleware: [mark("b")] })],
    });
    const chain = app.middlewareChain.map((m) => m.name);

    app.rebuild();
    app.rebuild();

    expect(app.middlewareChain.map((m) => m.name)).toEqual(chain);
  });

  it("addRouter copies routes and appends lifecycle hooks", async () => {
    const events: string[] = [];
    const app = new Application({
      onStartup: [() => void events.push("app-up")],
    });
    const router = new Router({
      routes: [gateway("/extra", get(() => ({ extra: true })))],
      onStartup: [() => void events.push("router-up")],
      onShutdown: [() => void events.push("router-down")],
    });

    app.addRouter(router);
    await app.startup();
    await app.shutdown();

    expect(events).toEqual(["app-up", "router-up", "router-down"]);
    const res = await request(app.instance).get("/extra");
    expect(res.body).toEqual({ extra: true });
  });

  it("refuses hooks from a router when the application uses lifespan", () => {
    const app = new Application({ lifespan: () => undefined });
    const router = new Router({ onStartup: [() => undefined] });
    expect(() => app.addRouter(router)).toThrow(/ROUTER_LIFESPAN_CONFLICT/);
  });
});

describe("Application: lifecycle", () => {
  it("runs a lifespan and its teardown once per cycle", async () => {
    const events: string[] = [];
    const app = new Application({
      lifespan: async (a) => {
        events.push(`up:${a.config.title}`);
        return () => {
          events.push("down");
        };
      },
      title: "svc",
    });

    await app.startup();
    await app.startup();
    await app.shutdown();
    await app.shutdown();

    expect(events).toEqual(["up:svc", "down"]);
  });

  it("listen() starts the app and close() shuts it down", async () => {
    const events: string[] = [];
    const app = new Application({
      onStartup: [() => void events.push("up")],
      onShutdown: [() => void events.push("down")],
      routes: [gateway("/ping", get(() => ({ pong: true })))],
    });

    const server = await app.listen(0, "127.0.0.1");
    expect(server.listening).toBe(true);
    expect(events).toEqual(["up"]);

    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
    await vi.waitFor(() => expect(events).toEqual(["up", "down"]));
  });
});
