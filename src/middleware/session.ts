// src/middleware/session.ts
/**
 * Purpose:
 * - Cookie-identified sessions. The cookie carries an HMAC-signed session id;
 *   data lives in a SessionStore (in-memory by default).
 *
 * Invariants:
 * - A tampered or unknown cookie yields a fresh, empty session.
 * - Nothing is stored and no cookie is set until the session is modified.
 * - Writes go to the store immediately; the cookie is set on first write
 *   while headers can still be sent.
 */

import { randomUUID } from "node:crypto";
import type { Response } from "express";
import type { SessionConfig } from "../config/types";
import { readCookie, sign, unsign } from "./cookies";
import type { Dispatch } from "./types";

export type SessionData = Record<string, unknown>;

export interface SessionStore {
  get(id: string): SessionData | undefined;
  set(id: string, data: SessionData, ttlMs: number): void;
  destroy(id: string): void;
}

export class MemorySessionStore implements SessionStore {
  private readonly entries = new Map<
    string,
    { data: SessionData; expiresAt: number }
  >();

  constructor(private readonly now: () => number = Date.now) {}

  public get(id: string): SessionData | undefined {
    const hit = this.entries.get(id);
    if (!hit) return undefined;
    if (hit.expiresAt <= this.now()) {
      this.entries.delete(id);
      return undefined;
    }
    return { ...hit.data };
  }

  /** Drops expired entries before storing. */
  public set(id: string, data: SessionData, ttlMs: number): void {
    const now = this.now();
    this.sweep(now);
    this.entries.set(id, { data: { ...data }, expiresAt: now + ttlMs });
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  public destroy(id: string): void {
    this.entries.delete(id);
  }

  public get size(): number {
    return this.entries.size;
  }
}

type CookieSettings = {
  name: string;
  secret: string;
  maxAgeMs: number;
  path: string;
  sameSite: "lax" | "strict" | "none";
  secure: boolean;
};

export class Session {
  private data: SessionData;
  private cookieSent = false;

  constructor(
    private _id: string,
    initial: SessionData | undefined,
    private readonly store: SessionStore,
    private readonly cookie: CookieSettings,
    private readonly res: Response
  ) {
    this.data = { ...(initial ?? {}) };
    this.isNew = initial === undefined;
  }

  public readonly isNew: boolean;

  public get id(): string {
    return this._id;
  }

  public get(key: string): unknown {
    return this.data[key];
  }

  public has(key: string): boolean {
    return key in this.data;
  }

  public all(): SessionData {
    return { ...this.data };
  }

  public set(key: string, value: unknown): void {
    this.data[key] = value;
    this.persist();
  }

  public delete(key: string): void {
    delete this.data[key];
    this.persist();
  }

  public clear(): void {
    this.data = {};
    this.store.destroy(this._id);
    if (!this.res.headersSent) {
      this.res.clearCookie(this.cookie.name, { path: this.cookie.path });
    }
    this.cookieSent = false;
  }

  /** New id, same data (e.g. after login). */
  public regenerate(): void {
    this.store.destroy(this._id);
    this._id = randomUUID();
    this.cookieSent = false;
    this.persist();
  }

  private persist(): void {
    this.store.set(this._id, this.data, this.cookie.maxAgeMs);
    if (this.cookieSent || this.res.headersSent) return;
    this.res.cookie(this.cookie.name, sign(this._id, this.cookie.secret), {
      path: this.cookie.path,
      maxAge: this.cookie.maxAgeMs,
      httpOnly: true,
      sameSite: this.cookie.sameSite,
      secure: this.cookie.secure,
    });
    this.cookieSent = true;
  }
}

export function sessionMiddleware(
  app: Dispatch,
  config: SessionConfig
): Dispatch {
  const store = config.store ?? new MemorySessionStore();
  const cookie: CookieSettings = {
    name: config.cookieName ?? "session",
    secret: config.secretKey,
    maxAgeMs: (config.maxAge ?? 14 * 24 * 60 * 60) * 1000,
    path: config.path ?? "/",
    sameSite: config.sameSite ?? "lax",
    secure: config.httpsOnly ?? false,
  };

  return (req, res, next) => {
    const raw = readCookie(req, cookie.name);
    const id = raw ? unsign(raw, cookie.secret) : null;
    const data = id ? store.get(id) : undefined;

    req.session =
      id && data
        ? new Session(id, data, store, cookie, res)
        : new Session(randomUUID(), undefined, store, cookie, res);

    app(req, res, next);
  };
}
