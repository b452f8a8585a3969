// src/middleware/cookies.ts
/**
 * Cookie header reads and HMAC signing shared by the CSRF and session layers.
 */

import * as cookie from "cookie";
import { createHmac, timingSafeEqual } from "node:crypto";
import type { Request } from "express";

/** First value of the named cookie, unquoted and decoded. */
export function readCookie(req: Request, name: string): string | undefined {
  return cookie.parse(req.headers.cookie ?? "")[name];
}

export function sign(value: string, secret: string): string {
  const mac = createHmac("sha256", secret).update(value).digest("base64url");
  return `${value}.${mac}`;
}

/** Returns the original value when the signature checks out, else null. */
export function unsign(signed: string, secret: string): string | null {
  const dot = signed.lastIndexOf(".");
  if (dot <= 0) return null;
  const value = signed.slice(0, dot);
  const expected = Buffer.from(sign(value, secret));
  const actual = Buffer.from(signed);
  if (expected.length !== actual.length) return null;
  return timingSafeEqual(expected, actual) ? value : null;
}
