// src/config/types.ts
/**
 * Purpose:
 * - Schemas for the nested configuration objects carried by the
 *   configuration record. Types are inferred from the schemas so validation
 *   and typing cannot drift.
 */

import { z } from "zod";
import type { Application } from "../app/Application";
import type { SessionStore } from "../middleware/session";

export const contactSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
  email: z.string().optional(),
});
export type Contact = z.infer<typeof contactSchema>;

export const licenseSchema = z.object({
  name: z.string(),
  url: z.string().optional(),
});
export type License = z.infer<typeof licenseSchema>;

export const serverInfoSchema = z.object({
  url: z.string(),
  description: z.string().optional(),
});
export type ServerInfo = z.infer<typeof serverInfoSchema>;

export const securityRequirementSchema = z.record(z.array(z.string()));
export type SecurityRequirement = z.infer<typeof securityRequirementSchema>;

export const corsConfigSchema = z.object({
  allowOrigins: z.array(z.string()).optional(),
  allowOriginRegex: z.string().optional(),
  allowMethods: z.array(z.string()).optional(),
  allowHeaders: z.array(z.string()).optional(),
  allowCredentials: z.boolean().optional(),
  exposeHeaders: z.array(z.string()).optional(),
  maxAge: z.number().int().nonnegative().optional(),
});
export type CorsConfig = z.infer<typeof corsConfigSchema>;

const sameSite = z.enum(["lax", "strict", "none"]);

export const csrfConfigSchema = z.object({
  secret: z.string().min(1),
  cookieName: z.string().optional(),
  headerName: z.string().optional(),
  cookiePath: z.string().optional(),
  cookieDomain: z.string().optional(),
  cookieSecure: z.boolean().optional(),
  cookieHttpOnly: z.boolean().optional(),
  cookieSameSite: sameSite.optional(),
  safeMethods: z.array(z.string()).optional(),
});
export type CsrfConfig = z.infer<typeof csrfConfigSchema>;

function isSessionStore(v: unknown): v is SessionStore {
  return (
    !!v &&
    typeof v === "object" &&
    "get" in v &&
    typeof v.get === "function" &&
    "set" in v &&
    typeof v.set === "function" &&
    "destroy" in v &&
    typeof v.destroy === "function"
  );
}

export const sessionConfigSchema = z.object({
  secretKey: z.string().min(1),
  cookieName: z.string().optional(),
  maxAge: z.number().int().positive().optional(), // seconds
  path: z.string().optional(),
  sameSite: sameSite.optional(),
  httpsOnly: z.boolean().optional(),
  store: z
    .custom<SessionStore>(isSessionStore, {
      message: "store must implement get/set/destroy",
    })
    .optional(),
});
export type SessionConfig = z.infer<typeof sessionConfigSchema>;

export const staticFilesConfigSchema = z.object({
  path: z.string().startsWith("/"),
  directory: z.string().min(1),
  maxAge: z.number().int().nonnegative().optional(), // milliseconds
  index: z.boolean().optional(),
});
export type StaticFilesConfig = z.infer<typeof staticFilesConfigSchema>;

export type TaskFn = () => unknown;

export const schedulerTaskSchema = z.object({
  everyMs: z.number().int().positive(),
  run: z.custom<TaskFn>((v) => typeof v === "function", {
    message: "run must be a function",
  }),
});
export type SchedulerTask = z.infer<typeof schedulerTaskSchema>;

export const schedulerConfigurationsSchema = z.object({
  runOnStart: z.boolean().optional(),
});
export type SchedulerConfigurations = z.infer<
  typeof schedulerConfigurationsSchema
>;

export type LifespanHook = () => unknown;
export type LifespanTeardown = () => unknown;
export type Lifespan = (
  app: Application
) => void | LifespanTeardown | Promise<void | LifespanTeardown>;
