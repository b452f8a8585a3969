// test/cookies.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { readCookie, sign, unsign } from "../src/middleware/cookies";

function echo(name: string) {
  const app = express();
  app.get("/", (req, res) => {
    res.json({ value: readCookie(req, name) ?? null });
  });
  return app;
}

describe("readCookie", () => {
  it("strips the quotes from a quoted value", async () => {
    const res = await request(echo("a")).get("/").set("Cookie", 'a="x.y"');
    expect(res.body).toEqual({ value: "x.y" });
  });

  it("keeps the first value of a repeated name", async () => {
    const res = await request(echo("a")).get("/").set("Cookie", "a=first; a=second");
    expect(res.body).toEqual({ value: "first" });
  });

  it("decodes percent-encoded values", async () => {
    const res = await request(echo("a")).get("/").set("Cookie", "b=1; a=hello%20world");
    expect(res.body).toEqual({ value: "hello world" });
  });

  it("returns undefined without a Cookie header", async () => {
    const res = await request(echo("a")).get("/");
    expect(res.body).toEqual({ value: null });
  });
});

describe("sign / unsign", () => {
  it("returns the value for a matching secret", () => {
    expect(unsign(sign("abc", "test-secret"), "test-secret")).toBe("abc");
  });

  it("returns null for another secret or a bare value", () => {
    expect(unsign(sign("abc", "test-secret"), "other-secret")).toBeNull();
    expect(unsign("abc", "test-secret")).toBeNull();
  });
});
