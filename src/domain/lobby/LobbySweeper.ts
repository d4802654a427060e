/* eslint-disable functional/prefer-readonly-type */
import type { Logger } from "../ports/Logger.js";
import type { ScheduledHandle, Scheduler } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";

interface LobbySweeperOptions {
  readonly scheduler: Scheduler;
  readonly intervalMs: number;
  readonly sweep: (at: TimePoint) => Promise<unknown>;
  readonly logger?: Logger;
}

/** Periodically runs the lobby timeout sweep until stopped */
export class LobbySweeper {
  readonly #scheduler: Scheduler;
  readonly #intervalMs: number;
  readonly #sweep: LobbySweeperOptions["sweep"];
  readonly #logger: Logger | undefined;
  #handle: ScheduledHandle | undefined;

  constructor(options: LobbySweeperOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error("Sweep interval must be positive");
    }

    this.#scheduler = options.scheduler;
    this.#intervalMs = options.intervalMs;
    this.#sweep = options.sweep;
    this.#logger = options.logger;
  }

  get running(): boolean {
    return this.#handle !== undefined;
  }

  start(): void {
    if (this.#handle) {
      return;
    }
    this.#scheduleNext();
    this.#logger?.info?.("Lobby sweeper started", { intervalMs: this.#intervalMs });
  }

  stop(): void {
    this.#handle?.cancel();
    this.#handle = undefined;
  }

  #scheduleNext(): void {
    this.#handle = this.#scheduler.schedule(this.#intervalMs, async () => {
      try {
        await this.#sweep(this.#scheduler.now());
      } finally {
        if (this.#handle) {
          this.#scheduleNext();
        }
      }
    });
  }
}
