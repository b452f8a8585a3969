// src/config/appConfig.ts
/**
 * Purpose:
 * - Configuration merger: explicit constructor options over settings
 *   defaults, one frozen record per build.
 *
 * Invariants:
 * - A field counts as provided when it is truthy; arrays, plain objects and
 *   Maps must also be non-empty. Otherwise the settings value is used.
 * - The corsConfig, csrfConfig and sessionConfig objects count as provided
 *   whenever they are set: `{}` means "enabled with all defaults".
 * - allowOrigins and corsConfig are mutually exclusive in explicit options.
 * - lifespan and onStartup/onShutdown are mutually exclusive in explicit
 *   options.
 * - The record is never patched; a mutation derives a new one.
 */

import { ImproperlyConfigured } from "../errors/exceptions";
import {
  toHandlerMap,
  type ExceptionHandlersInit,
} from "../exceptions/types";
import type { Middleware } from "../middleware/types";
import type { Permission } from "../routing/types";
import type { AppSettings } from "./settings";

/**
 * Constructor-level overrides. Collections accept readonly inputs;
 * exceptionHandlers may be a Map or a list of [key, handler] pairs.
 */
export type AppOptions = Partial<
  Omit<
    AppSettings,
    "exceptionHandlers" | "middleware" | "permissions" | "allowedHosts" | "allowOrigins"
  >
> & {
  exceptionHandlers?: ExceptionHandlersInit;
  middleware?: readonly Middleware[];
  permissions?: readonly Permission[];
  allowedHosts?: readonly string[];
  allowOrigins?: readonly string[];
};

export type AppConfig = Readonly<AppSettings>;

function isPlainObject(v: object): boolean {
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function isProvided(v: unknown): boolean {
  if (!v) return false;
  if (Array.isArray(v)) return v.length > 0;
  if (v instanceof Map) return v.size > 0;
  if (typeof v === "object" && isPlainObject(v)) {
    return Object.keys(v).length > 0;
  }
  return true;
}

/** Config objects: set means provided, even when empty. */
export function isConfigSet<T extends object>(v: T | null | undefined): v is T {
  return v !== undefined && v !== null;
}

function pickConfig<T extends object>(
  explicit: T | undefined,
  fallback: T | undefined
): T | undefined {
  return isConfigSet(explicit) ? explicit : fallback;
}

/** `explicit` when provided, else `fallback`. */
export function pick<T>(explicit: T | undefined, fallback: T): T {
  return explicit !== undefined && isProvided(explicit) ? explicit : fallback;
}

export function mergeAppConfig(
  explicit: AppOptions,
  defaults: AppSettings
): AppConfig {
  if (isProvided(explicit.allowOrigins) && isConfigSet(explicit.corsConfig)) {
    throw new ImproperlyConfigured(
      "CONFIG_CONFLICT: use allowOrigins or corsConfig, not both."
    );
  }
  if (
    isProvided(explicit.lifespan) &&
    (isProvided(explicit.onStartup) || isProvided(explicit.onShutdown))
  ) {
    throw new ImproperlyConfigured(
      "CONFIG_CONFLICT: use lifespan or onStartup/onShutdown, not both."
    );
  }

  const allowOrigins = [...pick(explicit.allowOrigins, defaults.allowOrigins)];
  const corsConfig = isProvided(explicit.allowOrigins)
    ? { allowOrigins }
    : pickConfig(explicit.corsConfig, defaults.corsConfig) ??
      (allowOrigins.length ? { allowOrigins } : undefined);

  const exceptionHandlers = toHandlerMap(
    pick<ExceptionHandlersInit>(
      explicit.exceptionHandlers,
      defaults.exceptionHandlers
    )
  );

  const config: AppSettings = {
    debug: pick(explicit.debug, defaults.debug),
    title: pick(explicit.title, defaults.title),
    appName: pick(explicit.appName, defaults.appName),
    description: pick(explicit.description, defaults.description),
    version: pick(explicit.version, defaults.version),
    summary: pick(explicit.summary, defaults.summary),
    contact: pick(explicit.contact, defaults.contact),
    termsOfService: pick(explicit.termsOfService, defaults.termsOfService),
    license: pick(explicit.license, defaults.license),
    servers: [...pick(explicit.servers, defaults.servers)],
    security: [...pick(explicit.security, defaults.security)],

    secretKey: pick(explicit.secretKey, defaults.secretKey),
    allowedHosts: [...pick(explicit.allowedHosts, defaults.allowedHosts)],
    allowOrigins,
    permissions: [...pick(explicit.permissions, defaults.permissions)],

    corsConfig,
    csrfConfig: pickConfig(explicit.csrfConfig, defaults.csrfConfig),
    sessionConfig: pickConfig(explicit.sessionConfig, defaults.sessionConfig),
    staticFilesConfig: [
      ...pick(explicit.staticFilesConfig, defaults.staticFilesConfig),
    ],

    schedulerTasks: { ...pick(explicit.schedulerTasks, defaults.schedulerTasks) },
    schedulerConfigurations: {
      ...pick(
        explicit.schedulerConfigurations,
        defaults.schedulerConfigurations
      ),
    },
    enableScheduler: pick(explicit.enableScheduler, defaults.enableScheduler),
    timezone: pick(explicit.timezone, defaults.timezone),

    rootPath: pick(explicit.rootPath, defaults.rootPath),
    middleware: [...pick(explicit.middleware, defaults.middleware)],
    exceptionHandlers,
    onStartup: [...pick(explicit.onStartup, defaults.onStartup)],
    onShutdown: [...pick(explicit.onShutdown, defaults.onShutdown)],
    lifespan: pick(explicit.lifespan, defaults.lifespan),

    tags: [...pick(explicit.tags, defaults.tags)],
    includeInSchema: pick(explicit.includeInSchema, defaults.includeInSchema),
    redirectSlashes: pick(explicit.redirectSlashes, defaults.redirectSlashes),
    logRequests: pick(explicit.logRequests, defaults.logRequests),
  };

  return Object.freeze(config);
}
