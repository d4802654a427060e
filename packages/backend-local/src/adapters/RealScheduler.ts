/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type {
  Logger,
  ScheduledHandle,
  ScheduledTask,
  Scheduler,
  TimePoint,
} from "../core.js";

interface RealSchedulerOptions {
  readonly logger?: Logger;
  readonly clock?: () => TimePoint;
}

/** Scheduler backed by `setTimeout`; a failing task is logged, never rethrown */
export class RealScheduler implements Scheduler {
  #timers: Set<ReturnType<typeof setTimeout>> = new Set();
  readonly #logger: Logger | undefined;
  readonly #clock: () => TimePoint;

  constructor(options: RealSchedulerOptions = {}) {
    this.#logger = options.logger;
    this.#clock = options.clock ?? Date.now;
  }

  get pending(): number {
    return this.#timers.size;
  }

  now(): TimePoint {
    return this.#clock();
  }

  schedule(delayMs: number, task: ScheduledTask): ScheduledHandle {
    if (delayMs < 0) {
      throw new Error("Delay must be non-negative");
    }

    const timer = setTimeout(async () => {
      this.#timers.delete(timer);
      try {
        await task();
      } catch (error) {
        this.#logger?.error?.("Scheduled task failed", { delayMs, error });
      }
    }, delayMs);
    this.#timers.add(timer);

    return {
      cancel: () => {
        clearTimeout(timer);
        this.#timers.delete(timer);
      },
    };
  }

  /** Drop every pending task; used on shutdown */
  cancelAll(): void {
    for (const timer of this.#timers) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }
}
