// test/stackBuilder.spec.ts
import express, { type RequestHandler } from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { mergeAppConfig } from "../src/config/appConfig";
import { defaultSettings } from "../src/config/settings";
import { getLogger } from "../src/logger/Logger";
import {
  buildMiddlewareChain,
  buildUserMiddleware,
  wrapChain,
} from "../src/middleware/stackBuilder";
import {
  defineMiddleware,
  type Dispatch,
  type MiddlewareSpec,
} from "../src/middleware/types";
import { ProblemFactory } from "../src/problem/problem";
import { gateway, get, include } from "../src/routing/gateways";

const log = getLogger({ test: "stackBuilder" });
const problems = new ProblemFactory({ app: "stack-test", appVersion: "" });

function mw(label: string): RequestHandler {
  const fn: RequestHandler = (_req, _res, next) => next();
  Object.defineProperty(fn, "name", { value: label });
  return fn;
}

function chainFor(userMiddleware: MiddlewareSpec[]) {
  return buildMiddlewareChain({
    userMiddleware,
    exceptionHandlers: { handlers: new Map() },
    debug: false,
    log,
    problems,
  });
}

describe("buildUserMiddleware", () => {
  it("puts declared middleware before route-contributed middleware", () => {
    const config = mergeAppConfig({ middleware: [mw("M0")] }, defaultSettings());
    const routes = [
      gateway("/one", get(() => 1), { middleware: [mw("M1")] }),
      gateway("/two", get(() => 2)),
    ];

    expect(buildUserMiddleware(config, routes).map((m) => m.name)).toEqual([
      "M0",
      "M1",
    ]);
  });

  it("orders built-ins host, cors, csrf, session ahead of everything", () => {
    const config = mergeAppConfig(
      {
        allowedHosts: ["api.test"],
        allowOrigins: ["https://web.test"],
        csrfConfig: { secret: "test-secret" },
        sessionConfig: { secretKey: "test-secret" },
        middleware: [mw("declared")],
      },
      defaultSettings()
    );
    const routes = [
      include("/r", {
        middleware: [mw("route")],
        routes: [gateway("/", get(() => "r"))],
      }),
    ];

    expect(buildUserMiddleware(config, routes).map((m) => m.name)).toEqual([
      "trustedHostMiddleware",
      "corsMiddleware",
      "csrfMiddleware",
      "sessionMiddleware",
      "declared",
      "route",
    ]);
  });

  it("adds no built-ins when none are configured", () => {
    const config = mergeAppConfig({}, defaultSettings());
    expect(buildUserMiddleware(config, [])).toEqual([]);
  });

  it("keeps a nested application's middleware out of the parent", () => {
    const config = mergeAppConfig({ middleware: [mw("parent")] }, defaultSettings());
    const child = { isApplicationBoundary: true as const, handle: mw("child") };

    const names = buildUserMiddleware(config, [
      include("/child", { app: child }),
    ]).map((m) => m.name);

    expect(names).toEqual(["parent"]);
  });

  it("does not append to the configuration record", () => {
    const config = mergeAppConfig({ middleware: [mw("M0")] }, defaultSettings());
    const routes = [gateway("/", get(() => 1), { middleware: [mw("M1")] })];

    buildUserMiddleware(config, routes);
    buildUserMiddleware(config, routes);

    expect(config.middleware).toHaveLength(1);
  });
});

describe("buildMiddlewareChain", () => {
  it.each([0, 1, 5])(
    "brackets %i user middleware with one boundary on each side",
    (n) => {
      const user = Array.from({ length: n }, (_, i) =>
        defineMiddleware((app: Dispatch) => app, {}, `user${i}`)
      );
      const names = chainFor(user).map((m) => m.name);

      expect(names[0]).toBe("errorBoundaryMiddleware");
      expect(names.slice(-2)).toEqual([
        "exceptionMiddleware",
        "asyncExitStackMiddleware",
      ]);
      expect(names.filter((x) => x === "errorBoundaryMiddleware")).toHaveLength(1);
      expect(names.filter((x) => x === "exceptionMiddleware")).toHaveLength(1);
      expect(names).toHaveLength(n + 3);
    }
  );
});

describe("wrapChain", () => {
  function recorder(trace: string[], label: string): MiddlewareSpec {
    return defineMiddleware(
      (app: Dispatch, opts: { label: string }) =>
        (req, res, next) => {
          trace.push(opts.label);
          app(req, res, next);
        },
      { label },
      label
    );
  }

  it("runs layers outer to inner in declaration order, router last", async () => {
    const trace: string[] = [];
    const router: Dispatch = (_req, res) => {
      trace.push("router");
      res.json({ ok: true });
    };
    const dispatch = wrapChain(
      [recorder(trace, "first"), recorder(trace, "second"), recorder(trace, "third")],
      router
    );

    const app = express();
    app.use(dispatch);
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(trace).toEqual(["first", "second", "third", "router"]);
  });

  it("returns the router itself for an empty chain", () => {
    const router: Dispatch = (_req, _res, next) => next();
    expect(wrapChain([], router)).toBe(router);
  });
});
