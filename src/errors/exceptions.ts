// src/errors/exceptions.ts
/**
 * Purpose:
 * - Error taxonomy shared by construction and dispatch.
 *
 * Invariants:
 * - ImproperlyConfigured is thrown synchronously at construction and never
 *   recovered there. When it escapes a request it renders as 500.
 * - HttpException subclasses carry the status the response must use.
 */

export class ImproperlyConfigured extends Error {
  public readonly detail?: string;

  constructor(message: string, detail?: string) {
    super(message);
    this.name = "ImproperlyConfigured";
    this.detail = detail;
  }
}

export type HttpExceptionInit = {
  detail?: string;
  code?: string;
  headers?: Record<string, string>;
  extra?: Record<string, unknown>;
};

export class HttpException extends Error {
  public readonly status: number;
  public readonly detail: string;
  public readonly code?: string;
  public readonly headers?: Record<string, string>;
  public readonly extra?: Record<string, unknown>;

  constructor(status: number, init: HttpExceptionInit = {}) {
    super(init.detail ?? `HTTP ${status}`);
    this.name = "HttpException";
    this.status = status;
    this.detail = init.detail ?? `HTTP ${status}`;
    this.code = init.code;
    this.headers = init.headers;
    this.extra = init.extra;
  }
}

export type ValidationIssue = {
  path: string;
  message: string;
};

export class ValidationErrorException extends HttpException {
  public readonly errors: ValidationIssue[];

  constructor(detail = "Validation failed", errors: ValidationIssue[] = []) {
    super(400, { detail, code: "VALIDATION_ERROR" });
    this.name = "ValidationErrorException";
    this.errors = errors;
  }
}

export class NotAuthorized extends HttpException {
  constructor(detail = "Not authorized") {
    super(401, { detail, code: "NOT_AUTHORIZED" });
    this.name = "NotAuthorized";
  }
}

export class PermissionDenied extends HttpException {
  constructor(detail = "You do not have permission to perform this action") {
    super(403, { detail, code: "PERMISSION_DENIED" });
    this.name = "PermissionDenied";
  }
}

export class NotFound extends HttpException {
  constructor(detail = "The resource cannot be found") {
    super(404, { detail, code: "NOT_FOUND" });
    this.name = "NotFound";
  }
}

export function isHttpException(err: unknown): err is HttpException {
  return err instanceof HttpException;
}
