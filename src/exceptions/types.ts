// src/exceptions/types.ts

import type { Request, Response } from "express";

/** Any Error subclass constructor, abstract ones included. */
export type ErrorClass = abstract new (...args: never[]) => Error;

/** An error kind: an error class, or an HTTP status code. */
export type ExceptionKey = ErrorClass | number;

export type ExceptionHandler = (
  err: Error,
  req: Request,
  res: Response
) => void | Promise<void>;

export type ExceptionHandlerMap = Map<ExceptionKey, ExceptionHandler>;

export type ExceptionHandlersInit =
  | ReadonlyMap<ExceptionKey, ExceptionHandler>
  | ReadonlyArray<readonly [ExceptionKey, ExceptionHandler]>;

export function toHandlerMap(
  init: ExceptionHandlersInit | undefined
): ExceptionHandlerMap {
  const out: ExceptionHandlerMap = new Map();
  if (!init) return out;
  for (const [key, handler] of init) out.set(key, handler);
  return out;
}

export function isExceptionKey(x: unknown): x is ExceptionKey {
  if (typeof x === "number") return Number.isInteger(x) && x >= 100 && x <= 599;
  return typeof x === "function" && (x === Error || x.prototype instanceof Error);
}

export function describeKey(key: ExceptionKey): string {
  return typeof key === "number" ? String(key) : key.name;
}
