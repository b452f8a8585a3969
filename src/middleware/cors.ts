// src/middleware/cors.ts
/**
 * Purpose:
 * - CORS layer backed by the `cors` package, configured from CorsConfig.
 *
 * Defaults (when a field is absent):
 * - allowOrigins ["*"], allowMethods ["*"], allowHeaders ["*"]
 * - allowCredentials false, exposeHeaders [], maxAge 600
 *
 * Notes:
 * - "*" origins with credentials reflect the request origin (a literal "*"
 *   is not valid alongside credentials).
 * - Preflight requests are answered here and never reach inner layers.
 */

import cors, { type CorsOptions } from "cors";
import type { CorsConfig } from "../config/types";
import type { Dispatch } from "./types";

const DEFAULT_METHODS = ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE"];

export function toCorsOptions(config: CorsConfig): CorsOptions {
  const origins = config.allowOrigins ?? ["*"];
  const methods = config.allowMethods ?? ["*"];
  const headers = config.allowHeaders ?? ["*"];
  const credentials = config.allowCredentials ?? false;

  let origin: CorsOptions["origin"];
  if (origins.includes("*")) {
    origin = credentials ? true : "*";
  } else {
    const list: Array<string | RegExp> = [...origins];
    if (config.allowOriginRegex) list.push(new RegExp(config.allowOriginRegex));
    origin = list;
  }

  return {
    origin,
    methods: methods.includes("*") ? DEFAULT_METHODS : methods,
    allowedHeaders: headers.includes("*") ? undefined : headers,
    credentials,
    exposedHeaders: config.exposeHeaders ?? [],
    maxAge: config.maxAge ?? 600,
    optionsSuccessStatus: 204,
  };
}

export function corsMiddleware(app: Dispatch, config: CorsConfig): Dispatch {
  const handle = cors(toCorsOptions(config));

  return (req, res, next) => {
    handle(req, res, (err?: unknown) => {
      if (err) return next(err);
      app(req, res, next);
    });
  };
}
