// src/middleware/trustedHost.ts
/**
 * Purpose:
 * - Reject requests whose Host header is not in the allow-list.
 *
 * Patterns:
 * - "*"               → any host
 * - "api.example.com" → exact match (case-insensitive, port ignored)
 * - "*.example.com"   → any subdomain of example.com (not the apex)
 */

import { ImproperlyConfigured } from "../errors/exceptions";
import type { Dispatch } from "./types";

export type TrustedHostOptions = {
  allowedHosts: readonly string[];
};

function validatePatterns(hosts: readonly string[]): string[] {
  return hosts.map((h) => {
    const p = h.trim().toLowerCase();
    if (!p) {
      throw new ImproperlyConfigured(
        "TRUSTED_HOST_INVALID: allowedHosts contains an empty entry."
      );
    }
    if (p !== "*" && p.includes("*") && !/^\*\.[^*]+$/.test(p)) {
      throw new ImproperlyConfigured(
        `TRUSTED_HOST_INVALID: "${h}". Wildcards are only allowed as "*" or a leading "*.".`
      );
    }
    return p;
  });
}

export function hostMatches(host: string, patterns: readonly string[]): boolean {
  const h = host.trim().toLowerCase();
  if (!h) return false;
  return patterns.some((p) => {
    if (p === "*") return true;
    if (p.startsWith("*.")) return h.endsWith(p.slice(1));
    return h === p;
  });
}

function stripPort(host: string): string {
  if (host.startsWith("[")) {
    const end = host.indexOf("]");
    return end > 0 ? host.slice(0, end + 1) : host;
  }
  const colon = host.indexOf(":");
  return colon >= 0 ? host.slice(0, colon) : host;
}

export function trustedHostMiddleware(
  app: Dispatch,
  options: TrustedHostOptions
): Dispatch {
  const patterns = validatePatterns(options.allowedHosts);
  const allowAll = patterns.includes("*");

  return (req, res, next) => {
    if (allowAll) return app(req, res, next);

    const host = stripPort(req.headers.host ?? "");
    if (hostMatches(host, patterns)) return app(req, res, next);

    res.status(400).json({
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      code: "INVALID_HOST",
      detail: "Invalid host header",
    });
  };
}
