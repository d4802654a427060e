/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type {
  ScheduledHandle,
  ScheduledTask,
  Scheduler,
} from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used by tests and simulations.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued tasks and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). This makes it possible
 * for tests to control timer progression without depending on real time or fake timers.
 */
interface QueuedTask {
  readonly seq: number;
  readonly fireAt: TimePoint;
  readonly task: ScheduledTask;
}

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly QueuedTask[];
}

export class InMemoryScheduler implements Scheduler {
  #state: SchedulerState;
  #nextSeq = 1;

  constructor(startAt: TimePoint = 0) {
    this.#state = { now: startAt, queue: [] };
  }

  /** Number of tasks waiting to fire */
  get pending(): number {
    return this.#state.queue.length;
  }

  now(): TimePoint {
    return this.#state.now;
  }

  schedule(delayMs: number, task: ScheduledTask): ScheduledHandle {
    if (delayMs < 0) {
      throw new Error("Delay must be non-negative");
    }

    const entry: QueuedTask = {
      seq: this.#nextSeq++,
      fireAt: this.#state.now + delayMs,
      task,
    };
    const insertAt = this.#state.queue.findIndex((existing) => existing.fireAt > entry.fireAt);
    const queue =
      insertAt === -1
        ? [...this.#state.queue, entry]
        : [
            ...this.#state.queue.slice(0, insertAt),
            entry,
            ...this.#state.queue.slice(insertAt),
          ];

    this.#state = { ...this.#state, queue };

    return {
      cancel: () => {
        this.#state = {
          ...this.#state,
          queue: this.#state.queue.filter((queued) => queued.seq !== entry.seq),
        };
      },
    };
  }

  /**
   * Advance the clock, running every task that falls due on the way, in order.
   * Tasks scheduled while running are picked up when they fall within the window.
   */
  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;

    for (;;) {
      const [next, ...remaining] = this.#state.queue;
      if (!next || next.fireAt > targetTime) {
        break;
      }

      this.#state = { now: next.fireAt, queue: remaining };
      await next.task();
    }

    this.#state = { ...this.#state, now: targetTime };
  }

  /** Run whatever is due right now without moving the clock */
  flush(): Promise<void> {
    return this.runFor(0);
  }
}
