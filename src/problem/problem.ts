// src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC7807-ish).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - ProblemFactory helpers used by default exception handlers and the
 *     final error funnel
 *
 * Invariants:
 * - No Express imports.
 * - No process.env access.
 */

import type { HttpException, ValidationIssue } from "../errors/exceptions";

export type ProblemJson = {
  type: string; // "about:blank" or a stable URN
  title: string;
  status: number;

  detail?: string;
  code?: string;

  requestId?: string;

  app?: string;
  appVersion?: string;

  errors?: ValidationIssue[];
  meta?: Record<string, unknown>;
};

const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  409: "Conflict",
  422: "Unprocessable Entity",
  500: "Internal Server Error",
  501: "Not Implemented",
  503: "Service Unavailable",
};

export function statusTitle(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Server Error" : "Request Failed");
}

export class ProblemFactory {
  private readonly app: string;
  private readonly appVersion: string;

  public constructor(opts: { app: string; appVersion: string }) {
    if (!opts?.app?.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: app is required. Dev: pass the application title."
      );
    }
    this.app = opts.app.trim();
    this.appVersion = (opts.appVersion ?? "").trim();
  }

  private base(p: Omit<ProblemJson, "app" | "appVersion">): ProblemJson {
    const out: ProblemJson = { app: this.app, ...p };
    if (this.appVersion) out.appVersion = this.appVersion;
    return out;
  }

  public fromStatus(
    status: number,
    detail?: string,
    code?: string
  ): ProblemJson {
    return this.base({
      type: "about:blank",
      title: statusTitle(status),
      status,
      detail,
      code,
    });
  }

  public fromHttpException(err: HttpException): ProblemJson {
    const p = this.fromStatus(err.status, err.detail, err.code);
    if (err.extra) p.meta = { ...err.extra };
    return p;
  }

  public internalError(detail?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: detail ?? "An unexpected error occurred.",
    });
  }

  public validation(detail: string, errors: ValidationIssue[]): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      code: "VALIDATION_ERROR",
      detail,
      errors,
    });
  }

  public misconfigured(detail: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Improperly Configured",
      status: 500,
      code: "IMPROPERLY_CONFIGURED",
      detail,
    });
  }
}
