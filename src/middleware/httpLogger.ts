// src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured request logs for an application's Express instance.
 * - Telemetry only: never blocks or alters a request.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Reuses x-request-id / x-correlation-id when present; mints a UUID
 *   otherwise, and echoes it back so callers can correlate.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { getRootLogger } from "../logger/Logger";

const QUIET_PATHS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

function firstHeader(req: IncomingMessage, name: string): string | undefined {
  const raw = req.headers[name];
  return Array.isArray(raw) ? raw[0] : raw;
}

export function makeHttpLogger(appName: string) {
  const logger = getRootLogger().child({ app: appName });

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const id =
        firstHeader(req, "x-request-id") ||
        firstHeader(req, "x-correlation-id") ||
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
