// src/base/ServiceBase.ts
/**
 * Purpose:
 * - Root for runtime classes (application, router, scheduler).
 * - Provides a consistent bound logger per component.
 *
 * Notes:
 * - `service` names the owning application in every log line; it defaults to
 *   "ashlar" until the application title is known.
 */

import { getLogger, type IBoundLogger } from "../logger/Logger";

type Dict = Record<string, unknown>;

export abstract class ServiceBase {
  protected readonly service: string;
  protected readonly log: IBoundLogger;
  private readonly baseLogContext: Dict;

  constructor(opts?: { service?: string; context?: Dict }) {
    this.service = (opts?.service ?? "").trim() || "ashlar";
    this.baseLogContext = {
      service: this.service,
      component: this.constructor.name,
      ...(opts?.context ?? {}),
    };
    this.log = getLogger().bind(this.baseLogContext);
  }

  protected bindLog(ctx: Dict): IBoundLogger {
    return this.log.bind(ctx);
  }

  protected getLogContext(): Dict {
    return { ...this.baseLogContext };
  }
}
