// src/routing/aggregate.ts
/**
 * Purpose:
 * - Pure walk over the route tree feeding the middleware and exception-handler
 *   builders.
 *
 * Invariants:
 * - Explicit worklist (no recursion); deep trees cannot exhaust the stack.
 * - Pre-order, children in declaration order.
 * - Never mutates a node; always returns a fresh array.
 * - Nested-application boundaries are never descended into.
 */

import type { ExceptionHandler, ExceptionKey } from "../exceptions/types";
import type { Middleware } from "../middleware/types";
import { isApplicationBoundary, type RouteNode } from "./types";

export type Extraction<T> = {
  items: readonly T[];
  descend: boolean;
};

export type RouteExtractor<T> = (node: RouteNode) => Extraction<T>;

export function collectRoutes<T>(
  routes: readonly RouteNode[],
  extractor: RouteExtractor<T>
): T[] {
  const out: T[] = [];
  // Reversed so pop() yields declaration order.
  const stack: RouteNode[] = [...routes].reverse();

  while (stack.length) {
    const node = stack.pop();
    if (!node) break;

    const { items, descend } = extractor(node);
    out.push(...items);

    if (descend && node.kind === "include") {
      for (let i = node.routes.length - 1; i >= 0; i--) {
        stack.push(node.routes[i]);
      }
    }
  }

  return out;
}

/**
 * Route-contributed middleware:
 * - boundary Include: nothing
 * - Include: its own middleware, then its children's
 * - Gateway: its middleware, then its handler's
 */
export const middlewareExtractor: RouteExtractor<Middleware> = (node) => {
  if (isApplicationBoundary(node)) return { items: [], descend: false };
  if (node.kind === "include") {
    return { items: node.middleware, descend: true };
  }
  return {
    items: [...node.middleware, ...node.handler.middleware],
    descend: false,
  };
};

export type HandlerEntry = readonly [ExceptionKey, ExceptionHandler];

/**
 * Route-contributed exception handlers, top-down:
 * - Include (boundary or not): its own handlers; descends unless boundary
 * - Gateway: its handlers, then its handler's
 * Later entries win when merged into a map.
 */
export const exceptionHandlerExtractor: RouteExtractor<HandlerEntry> = (
  node
) => {
  if (node.kind === "include") {
    return {
      items: [...node.exceptionHandlers.entries()],
      descend: !isApplicationBoundary(node),
    };
  }
  return {
    items: [
      ...node.exceptionHandlers.entries(),
      ...node.handler.exceptionHandlers.entries(),
    ],
    descend: false,
  };
};
