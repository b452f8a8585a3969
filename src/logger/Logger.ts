// src/logger/Logger.ts
/**
 * Purpose:
 * - Single logging API for the framework core with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - Backed by a pino root logger; bound context is merged into every record.
 *
 * Runtime Controls:
 * - LOG_LEVEL = trace | debug | info | warn | error | fatal | silent
 *   (defaults to "info"; tests run with "silent").
 *
 * Notes:
 * - setRootLogger() swaps the sink (e.g. an app-provided pino instance).
 *   Bound loggers resolve the root lazily, so handles created earlier follow it.
 */

import pino, {
  type Logger as PinoLogger,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

type Json = Record<string, unknown>;

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Record<string, unknown>): IBoundLogger;

  info(msg: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;

  debug(msg: string, ...rest: unknown[]): void;
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;

  warn(msg: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;

  error(msg: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

// ────────────────────────────────────────────────────────────────────────────
// Root logger
// ────────────────────────────────────────────────────────────────────────────

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(v: string): v is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(v);
}

export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return "info";
  if (!isLevel(v)) {
    throw new Error(
      `Logger: invalid LOG_LEVEL="${v}". Use one of ${LEVELS.join("|")}.`
    );
  }
  return v;
}

function createRoot(level: LevelWithSilent): PinoLogger {
  return pino({
    level,
    base: { framework: "ashlar" },
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  });
}

let ROOT: PinoLogger | null = null;

function root(): PinoLogger {
  if (!ROOT) ROOT = createRoot(resolveLogLevel(process.env.LOG_LEVEL));
  return ROOT;
}

export function setRootLogger(logger: PinoLogger): void {
  ROOT = logger;
}

/** Adjust the level of the current root in place. */
export function setLogLevel(level: string): void {
  root().level = resolveLogLevel(level);
}

/** Raw pino root, for adapters such as pino-http. */
export function getRootLogger(): PinoLogger {
  return root();
}

export function getLogger(
  initialCtx: Record<string, unknown> = {}
): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

type Level = "info" | "debug" | "warn" | "error";

function isPlainObject(x: unknown): x is Json {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/**
 * Normalize (msg, meta) | (meta, msg) | (msg) into pino's (obj, msg) shape.
 * Extra plain-object args are folded into obj; anything else is kept as `extra`.
 */
function normalize(
  ctx: Json,
  arg1: unknown,
  arg2: unknown,
  rest: unknown[]
): [Json, string | undefined] {
  const obj: Json = { ...ctx };
  let msg: string | undefined;
  const extra: unknown[] = [];

  if (typeof arg1 === "string") {
    msg = arg1;
    for (const r of [arg2, ...rest]) {
      if (isPlainObject(r)) Object.assign(obj, r);
      else if (r !== undefined) extra.push(r);
    }
  } else if (isPlainObject(arg1)) {
    Object.assign(obj, arg1);
    if (typeof arg2 === "string") msg = arg2;
    else if (isPlainObject(arg2)) Object.assign(obj, arg2);
    else if (arg2 !== undefined) extra.push(arg2);
    for (const r of rest) {
      if (isPlainObject(r)) Object.assign(obj, r);
      else if (r !== undefined) extra.push(r);
    }
  } else if (arg1 !== undefined) {
    extra.push(arg1, ...[arg2, ...rest].filter((x) => x !== undefined));
  }

  if (extra.length) obj.extra = extra;
  return [obj, msg];
}

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Record<string, unknown> = {}) {}

  public bind(ctx: Record<string, unknown>): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  private emit(level: Level, arg1: unknown, arg2: unknown, rest: unknown[]) {
    const r = root();
    if (!r.isLevelEnabled(level)) return;
    const [obj, msg] = normalize(this.ctx, arg1, arg2, rest);
    if (msg === undefined) r[level](obj);
    else r[level](obj, msg);
  }

  public info = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    this.emit("info", arg1, arg2, rest);
  };

  public debug = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    this.emit("debug", arg1, arg2, rest);
  };

  public warn = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    this.emit("warn", arg1, arg2, rest);
  };

  public error = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    this.emit("error", arg1, arg2, rest);
  };

  public serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  } {
    if (err instanceof Error) {
      return { name: err.name, message: err.message, stack: err.stack };
    }
    return { message: String(err) };
  }
}
