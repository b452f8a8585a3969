// src/index.ts

export { Application, ChildApplication } from "./app/Application";
export type { ApplicationOptions } from "./app/Application";

export {
  mergeAppConfig,
  isConfigSet,
  isProvided,
  pick,
} from "./config/appConfig";
export type { AppConfig, AppOptions } from "./config/appConfig";
export {
  appSettingsSchema,
  defaultSettings,
  loadSettingsFromEnv,
  parseSettings,
} from "./config/settings";
export type {
  AppSettings,
  AppSettingsInput,
  LoadSettingsOptions,
} from "./config/settings";
export type {
  Contact,
  CorsConfig,
  CsrfConfig,
  License,
  Lifespan,
  LifespanHook,
  LifespanTeardown,
  SchedulerConfigurations,
  SchedulerTask,
  ServerInfo,
  SessionConfig,
  StaticFilesConfig,
} from "./config/types";

export {
  HttpException,
  ImproperlyConfigured,
  NotAuthorized,
  NotFound,
  PermissionDenied,
  ValidationErrorException,
  isHttpException,
} from "./errors/exceptions";
export type { ValidationIssue } from "./errors/exceptions";

export {
  defaultExceptionHandlers,
  improperlyConfiguredHandler,
  validationErrorHandler,
} from "./exceptions/defaultHandlers";
export {
  buildExceptionHandlers,
  lookupExceptionHandler,
  partitionExceptionHandlers,
} from "./exceptions/handlerRegistry";
export type { ResolvedExceptionHandlers } from "./exceptions/handlerRegistry";
export type {
  ErrorClass,
  ExceptionHandler,
  ExceptionHandlerMap,
  ExceptionKey,
} from "./exceptions/types";

export { getLogger, setLogLevel, setRootLogger } from "./logger/Logger";
export type { IBoundLogger } from "./logger/Logger";

export { getRequestScope, pushCleanup } from "./middleware/asyncExitStack";
export type { RequestScope } from "./middleware/asyncExitStack";
export { generateCsrfToken } from "./middleware/csrf";
export { MemorySessionStore, Session } from "./middleware/session";
export type { SessionData, SessionStore } from "./middleware/session";
export {
  buildMiddlewareChain,
  buildUserMiddleware,
  wrapChain,
} from "./middleware/stackBuilder";
export { defineMiddleware, fromRequestHandler } from "./middleware/types";
export type {
  Dispatch,
  Middleware,
  MiddlewareFactory,
  MiddlewareSpec,
} from "./middleware/types";

export { ProblemFactory } from "./problem/problem";
export type { ProblemJson } from "./problem/problem";

export {
  collectRoutes,
  exceptionHandlerExtractor,
  middlewareExtractor,
} from "./routing/aggregate";
export type { Extraction, RouteExtractor } from "./routing/aggregate";
export {
  del,
  gateway,
  get,
  handler,
  include,
  patch,
  post,
  put,
} from "./routing/gateways";
export type { IncludeOptions, LayerOptions } from "./routing/gateways";
export { Router } from "./routing/Router";
export type { RouterOptions } from "./routing/Router";
export type {
  Gateway,
  HttpMethod,
  Include,
  NestedApplication,
  Permission,
  PermissionContext,
  RouteHandler,
  RouteHandlerFn,
  RouteNode,
} from "./routing/types";

export { Scheduler } from "./scheduler/Scheduler";
export type { SchedulerOptions } from "./scheduler/Scheduler";
