// src/exceptions/defaultHandlers.ts
/**
 * Purpose:
 * - Framework default handlers for the two built-in error kinds:
 *   ImproperlyConfigured (500) and ValidationErrorException (400).
 * - Both render problem+json through the application's ProblemFactory.
 */

import {
  ImproperlyConfigured,
  ValidationErrorException,
} from "../errors/exceptions";
import type { ProblemFactory } from "../problem/problem";
import { getRequestScope } from "../middleware/asyncExitStack";
import type { ExceptionHandler, ExceptionKey } from "./types";

function withRequestId<T extends { requestId?: string }>(p: T): T {
  const requestId = getRequestScope()?.requestId;
  return requestId ? { ...p, requestId } : p;
}

export function improperlyConfiguredHandler(
  problems: ProblemFactory
): ExceptionHandler {
  return (err, _req, res) => {
    const detail =
      err instanceof ImproperlyConfigured && err.detail
        ? `${err.message} ${err.detail}`
        : err.message;
    res.status(500).json(withRequestId(problems.misconfigured(detail)));
  };
}

export function validationErrorHandler(
  problems: ProblemFactory
): ExceptionHandler {
  return (err, _req, res) => {
    const errors = err instanceof ValidationErrorException ? err.errors : [];
    res.status(400).json(withRequestId(problems.validation(err.message, errors)));
  };
}

export function defaultExceptionHandlers(
  problems: ProblemFactory
): ReadonlyArray<readonly [ExceptionKey, ExceptionHandler]> {
  return [
    [ImproperlyConfigured, improperlyConfiguredHandler(problems)],
    [ValidationErrorException, validationErrorHandler(problems)],
  ];
}
