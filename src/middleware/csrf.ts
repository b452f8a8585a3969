// src/middleware/csrf.ts
/**
 * Purpose:
 * - CSRF protection using a signed double-submit cookie.
 *
 * Flow:
 * - Safe methods: ensure the cookie exists (mint + sign when missing) and
 *   expose the token as `req.csrfToken`.
 * - Unsafe methods: the header value must equal the cookie value and carry a
 *   valid signature; otherwise 403 CSRF_INVALID.
 */

import { randomBytes, timingSafeEqual } from "node:crypto";
import type { CsrfConfig } from "../config/types";
import { readCookie, sign, unsign } from "./cookies";
import type { Dispatch } from "./types";

const DEFAULTS = {
  cookieName: "csrftoken",
  headerName: "x-csrftoken",
  cookiePath: "/",
  cookieSecure: false,
  cookieHttpOnly: false,
  cookieSameSite: "lax" as const,
  safeMethods: ["GET", "HEAD", "OPTIONS"],
};

export function generateCsrfToken(secret: string): string {
  return sign(randomBytes(32).toString("hex"), secret);
}

function sameToken(a: string, b: string): boolean {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  return ab.length === bb.length && timingSafeEqual(ab, bb);
}

export function csrfMiddleware(app: Dispatch, config: CsrfConfig): Dispatch {
  const opts = {
    secret: config.secret,
    cookieName: config.cookieName ?? DEFAULTS.cookieName,
    headerName: config.headerName ?? DEFAULTS.headerName,
    cookiePath: config.cookiePath ?? DEFAULTS.cookiePath,
    cookieDomain: config.cookieDomain,
    cookieSecure: config.cookieSecure ?? DEFAULTS.cookieSecure,
    cookieHttpOnly: config.cookieHttpOnly ?? DEFAULTS.cookieHttpOnly,
    cookieSameSite: config.cookieSameSite ?? DEFAULTS.cookieSameSite,
    safeMethods: config.safeMethods ?? DEFAULTS.safeMethods,
  };
  const safe = new Set(opts.safeMethods.map((m) => m.toUpperCase()));
  const headerName = opts.headerName.toLowerCase();

  return (req, res, next) => {
    const cookieToken = readCookie(req, opts.cookieName);
    const validCookie =
      cookieToken && unsign(cookieToken, opts.secret) !== null
        ? cookieToken
        : undefined;

    if (safe.has(req.method.toUpperCase())) {
      let token = validCookie;
      if (!token) {
        token = generateCsrfToken(opts.secret);
        res.cookie(opts.cookieName, token, {
          path: opts.cookiePath,
          domain: opts.cookieDomain,
          secure: opts.cookieSecure,
          httpOnly: opts.cookieHttpOnly,
          sameSite: opts.cookieSameSite,
        });
      }
      req.csrfToken = token;
      return app(req, res, next);
    }

    const submitted = req.headers[headerName];
    const headerToken = Array.isArray(submitted) ? submitted[0] : submitted;

    if (!validCookie || !headerToken || !sameToken(validCookie, headerToken)) {
      res.status(403).json({
        type: "about:blank",
        title: "Forbidden",
        status: 403,
        code: "CSRF_INVALID",
        detail: "CSRF token verification failed",
      });
      return;
    }

    req.csrfToken = validCookie;
    app(req, res, next);
  };
}
