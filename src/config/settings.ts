// src/config/settings.ts
/**
 * Purpose:
 * - The settings object: every configuration field the merger reads as a
 *   default. Passed explicitly to the application; never a process-wide
 *   singleton.
 * - zod schema is the single source of truth for the shape and the defaults.
 *
 * Runtime Controls (loadSettingsFromEnv):
 * - ASHLAR_TITLE, ASHLAR_APP_NAME, ASHLAR_VERSION, ASHLAR_DEBUG,
 *   ASHLAR_SECRET_KEY, ASHLAR_ALLOWED_HOSTS (csv), ASHLAR_ALLOW_ORIGINS (csv),
 *   ASHLAR_ROOT_PATH, ASHLAR_ENABLE_SCHEDULER, ASHLAR_TIMEZONE,
 *   ASHLAR_LOG_REQUESTS
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ImproperlyConfigured } from "../errors/exceptions";
import type { ExceptionHandlerMap } from "../exceptions/types";
import { isMiddleware, type Middleware } from "../middleware/types";
import { isPermission, type Permission } from "../routing/types";
import {
  contactSchema,
  corsConfigSchema,
  csrfConfigSchema,
  licenseSchema,
  schedulerConfigurationsSchema,
  schedulerTaskSchema,
  securityRequirementSchema,
  serverInfoSchema,
  sessionConfigSchema,
  staticFilesConfigSchema,
  type Lifespan,
  type LifespanHook,
} from "./types";

function isFunction(v: unknown): v is (...args: never[]) => unknown {
  return typeof v === "function";
}

const hookSchema = z.custom<LifespanHook>(isFunction, {
  message: "hook must be a function",
});

export const appSettingsSchema = z
  .object({
    debug: z.boolean().default(false),
    title: z.string().default("ashlar"),
    appName: z.string().default("ashlar"),
    version: z.string().default("0.1.0"),
    description: z.string().default(""),
    summary: z.string().default(""),
    contact: contactSchema.optional(),
    termsOfService: z.string().optional(),
    license: licenseSchema.optional(),
    servers: z.array(serverInfoSchema).default([]),
    security: z.array(securityRequirementSchema).default([]),

    secretKey: z.string().default(""),
    allowedHosts: z.array(z.string().min(1)).default([]),
    allowOrigins: z.array(z.string().min(1)).default([]),
    permissions: z
      .array(
        z.custom<Permission>(isPermission, {
          message: "permission must implement hasPermission()",
        })
      )
      .default([]),

    corsConfig: corsConfigSchema.optional(),
    csrfConfig: csrfConfigSchema.optional(),
    sessionConfig: sessionConfigSchema.optional(),
    staticFilesConfig: z.array(staticFilesConfigSchema).default([]),

    schedulerTasks: z.record(schedulerTaskSchema).default({}),
    schedulerConfigurations: schedulerConfigurationsSchema.default({}),
    enableScheduler: z.boolean().default(false),
    timezone: z.string().default("UTC"),

    rootPath: z
      .string()
      .refine((p) => p === "" || p.startsWith("/"), {
        message: 'rootPath must be empty or start with "/"',
      })
      .default(""),
    middleware: z
      .array(
        z.custom<Middleware>(isMiddleware, {
          message: "middleware must be a MiddlewareSpec or a request handler",
        })
      )
      .default([]),
    exceptionHandlers: z
      .custom<ExceptionHandlerMap>((v) => v instanceof Map, {
        message: "exceptionHandlers must be a Map",
      })
      .default(() => new Map()),
    onStartup: z.array(hookSchema).default([]),
    onShutdown: z.array(hookSchema).default([]),
    lifespan: z
      .custom<Lifespan>(isFunction, { message: "lifespan must be a function" })
      .optional(),

    tags: z.array(z.string()).default([]),
    includeInSchema: z.boolean().default(true),
    redirectSlashes: z.boolean().default(true),
    logRequests: z.boolean().default(false),
  })
  .strict();

export type AppSettings = z.output<typeof appSettingsSchema>;
export type AppSettingsInput = z.input<typeof appSettingsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function parseSettings(input: AppSettingsInput = {}): AppSettings {
  const parsed = appSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ImproperlyConfigured(
      "SETTINGS_INVALID: settings failed validation.",
      describeIssues(parsed.error)
    );
  }
  return parsed.data;
}

export function defaultSettings(): AppSettings {
  return parseSettings({});
}

// ────────────────────────────────────────────────────────────────────────────
// Environment
// ────────────────────────────────────────────────────────────────────────────

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const csv = z.string().transform((s) =>
  s
    .split(",")
    .map((x) => x.trim())
    .filter(Boolean)
);

const trimmed = z.string().transform((s) => s.trim());

const envSchema = z.object({
  ASHLAR_TITLE: trimmed.optional(),
  ASHLAR_APP_NAME: trimmed.optional(),
  ASHLAR_VERSION: trimmed.optional(),
  ASHLAR_DEBUG: flag.optional(),
  ASHLAR_SECRET_KEY: z.string().optional(),
  ASHLAR_ALLOWED_HOSTS: csv.optional(),
  ASHLAR_ALLOW_ORIGINS: csv.optional(),
  ASHLAR_ROOT_PATH: z.string().optional(),
  ASHLAR_ENABLE_SCHEDULER: flag.optional(),
  ASHLAR_TIMEZONE: trimmed.optional(),
  ASHLAR_LOG_REQUESTS: flag.optional(),
});

export type LoadSettingsOptions = {
  /** Path of the .env file; `false` skips the file. Defaults to ".env". */
  envFile?: string | false;
  /** Variables to read; defaults to process.env. Never written to. */
  env?: Record<string, string | undefined>;
};

/**
 * Settings from environment variables, with a .env file filling the gaps.
 * Values already present in `env` win over the file.
 */
export function loadSettingsFromEnv(
  opts: LoadSettingsOptions = {}
): AppSettings {
  const fromFile: Record<string, string> =
    opts.envFile === false
      ? {}
      : dotenv.config({ path: opts.envFile ?? ".env", processEnv: {} })
          .parsed ?? {};

  // Blank values count as unset.
  const raw = Object.fromEntries(
    Object.entries({ ...fromFile, ...(opts.env ?? process.env) }).filter(
      ([, v]) => v !== undefined && v.trim() !== ""
    )
  );
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ImproperlyConfigured(
      "SETTINGS_ENV_INVALID: environment variables failed validation.",
      describeIssues(parsed.error)
    );
  }
  const e = parsed.data;

  return parseSettings({
    title: e.ASHLAR_TITLE,
    appName: e.ASHLAR_APP_NAME,
    version: e.ASHLAR_VERSION,
    debug: e.ASHLAR_DEBUG,
    secretKey: e.ASHLAR_SECRET_KEY,
    allowedHosts: e.ASHLAR_ALLOWED_HOSTS,
    allowOrigins: e.ASHLAR_ALLOW_ORIGINS,
    rootPath: e.ASHLAR_ROOT_PATH,
    enableScheduler: e.ASHLAR_ENABLE_SCHEDULER,
    timezone: e.ASHLAR_TIMEZONE,
    logRequests: e.ASHLAR_LOG_REQUESTS,
  });
}
