// src/scheduler/Scheduler.ts
/**
 * Purpose:
 * - Interval scheduler for the application's `schedulerTasks`.
 *
 * Invariants:
 * - start() arms one timer per task; a second start() is a no-op.
 * - stop() clears every timer; runs already in flight finish on their own.
 * - A task never overlaps itself: a tick is skipped while the previous run
 *   is still pending.
 * - A failing task is logged; it never throws into the timer.
 * - Intervals are elapsed time only; they do not depend on a timezone.
 */

import { ServiceBase } from "../base/ServiceBase";
import type {
  SchedulerConfigurations,
  SchedulerTask,
} from "../config/types";

export type SchedulerOptions = {
  tasks: Readonly<Record<string, SchedulerTask>>;
  configurations?: SchedulerConfigurations;
  service?: string;
};

export class Scheduler extends ServiceBase {
  private readonly tasks: ReadonlyMap<string, SchedulerTask>;
  private readonly runOnStart: boolean;

  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly running = new Set<string>();

  constructor(opts: SchedulerOptions) {
    super({ service: opts.service, context: { component: "Scheduler" } });
    this.tasks = new Map(Object.entries(opts.tasks));
    this.runOnStart = opts.configurations?.runOnStart ?? false;
  }

  public get isRunning(): boolean {
    return this.timers.size > 0;
  }

  public taskNames(): string[] {
    return [...this.tasks.keys()];
  }

  public start(): void {
    if (this.isRunning) return;

    for (const [name, task] of this.tasks) {
      this.timers.set(
        name,
        setInterval(() => {
          void this.runTask(name, task);
        }, task.everyMs)
      );
      if (this.runOnStart) void this.runTask(name, task);
    }

    this.log.info(
      { event: "scheduler_started", tasks: this.taskNames() },
      "scheduler started"
    );
  }

  public stop(): void {
    if (!this.isRunning) return;
    for (const t of this.timers.values()) clearInterval(t);
    this.timers.clear();
    this.log.info({ event: "scheduler_stopped" }, "scheduler stopped");
  }

  /** Run one task now. Resolves false when the task is unknown or busy. */
  public async runNow(name: string): Promise<boolean> {
    const task = this.tasks.get(name);
    if (!task) return false;
    return this.runTask(name, task);
  }

  private async runTask(name: string, task: SchedulerTask): Promise<boolean> {
    if (this.running.has(name)) {
      this.log.debug({ task: name }, "task still running; tick skipped");
      return false;
    }
    this.running.add(name);
    try {
      await task.run();
      this.log.debug({ task: name }, "task completed");
      return true;
    } catch (err) {
      this.log.error(
        { task: name, error: this.log.serializeError(err) },
        "task failed"
      );
      return false;
    } finally {
      this.running.delete(name);
    }
  }
}
