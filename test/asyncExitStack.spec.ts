// test/asyncExitStack.spec.ts
import request from "supertest";
import { describe, it, expect, vi } from "vitest";
import { Application } from "../src/app/Application";
import { NotFound } from "../src/errors/exceptions";
import {
  getRequestScope,
  pushCleanup,
} from "../src/middleware/asyncExitStack";
import { gateway, get } from "../src/routing/gateways";

function build(trace: string[]) {
  const register = () => {
    pushCleanup(() => void trace.push("first-registered"));
    pushCleanup(async () => {
      await Promise.resolve();
      trace.push("second-registered");
    });
  };

  return new Application({
    exceptionHandlers: [
      [
        404,
        (_err, _req, res) => {
          trace.push("handler");
          res.status(404).json({ handled: true });
        },
      ],
    ],
    routes: [
      gateway(
        "/ok",
        get(() => {
          register();
          return { ok: true };
        })
      ),
      gateway(
        "/typed",
        get(() => {
          register();
          throw new NotFound();
        })
      ),
      gateway(
        "/unhandled",
        get(async () => {
          register();
          throw new Error("unexpected");
        })
      ),
      gateway(
        "/cleanup-fails",
        get(() => {
          pushCleanup(() => void trace.push("still-runs"));
          pushCleanup(() => {
            throw new Error("cleanup broke");
          });
          return { ok: true };
        })
      ),
      gateway(
        "/scope",
        get(() => {
          const scope = getRequestScope();
          scope?.state.set("seen", true);
          return {
            requestId: scope?.requestId,
            seen: scope?.state.get("seen"),
          };
        })
      ),
    ],
  });
}

describe("asyncExitStackMiddleware", () => {
  it("runs cleanups LIFO after a successful response", async () => {
    const trace: string[] = [];
    const res = await request(build(trace).instance).get("/ok");

    expect(res.status).toBe(200);
    await vi.waitFor(() =>
      expect(trace).toEqual(["second-registered", "first-registered"])
    );
  });

  it("runs cleanups before a typed error reaches its handler", async () => {
    const trace: string[] = [];
    const res = await request(build(trace).instance).get("/typed");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ handled: true });
    expect(trace).toEqual(["second-registered", "first-registered", "handler"]);
  });

  it("runs cleanups on an unhandled error", async () => {
    const trace: string[] = [];
    const res = await request(build(trace).instance).get("/unhandled");

    expect(res.status).toBe(500);
    expect(trace).toEqual(["second-registered", "first-registered"]);
  });

  it("keeps running cleanups after one fails", async () => {
    const trace: string[] = [];
    const res = await request(build(trace).instance).get("/cleanup-fails");

    expect(res.status).toBe(200);
    await vi.waitFor(() => expect(trace).toEqual(["still-runs"]));
  });

  it("exposes a per-request scope", async () => {
    const app = build([]);

    const res = await request(app.instance)
      .get("/scope")
      .set("x-correlation-id", "corr-1");

    expect(res.body).toEqual({ requestId: "corr-1", seen: true });
    expect(res.headers["x-request-id"]).toBe("corr-1");
  });

  it("refuses cleanups outside a request", () => {
    expect(getRequestScope()).toBeUndefined();
    expect(() => pushCleanup(() => undefined)).toThrow(/REQUEST_SCOPE_MISSING/);
  });
});
