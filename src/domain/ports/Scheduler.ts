import type { TimePoint } from "../typedefs.js";

export type ScheduledTask = () => Promise<void> | void;

export interface ScheduledHandle {
  /**
   * Drop the task if it has not fired yet. A task that already started is
   * not interrupted; consumers must detect staleness on their own.
   */
  cancel(): void;
}

/**
 * Infrastructure abstraction responsible for running deferred work.
 *
 * Implementations may rely on in-memory timers or a virtual clock. Tasks run at most once,
 * never before their delay has elapsed, and a task scheduled with a zero delay runs only
 * after the task that scheduled it has completed.
 */
export interface Scheduler {
  schedule(delayMs: number, task: ScheduledTask): ScheduledHandle;

  /** Current time on the scheduler's clock */
  now(): TimePoint;
}
