/* eslint-disable functional/prefer-readonly-type */
import { gameTopic } from "../events.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus, Unsubscribe } from "../ports/MessageBus.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { GameId, RoundId, TimePoint } from "../typedefs.js";

export interface TimeoutWatcher {
  watch(gameId: GameId): void;
  unwatch(gameId: GameId): void;
}

export type RoundTimeoutHandler = (
  gameId: GameId,
  roundId: RoundId,
  at: TimePoint,
) => Promise<void>;

interface RoundTimeoutWatcherOptions {
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly onTimeout: RoundTimeoutHandler;
  readonly logger?: Logger;
}

/**
 * Turns `RoundTimeout` broadcasts into round advancement.
 *
 * The handler runs as a fresh scheduler task: the session publishing the
 * timeout is still busy with it, and advancing restarts that same session.
 */
export class RoundTimeoutWatcher implements TimeoutWatcher {
  #watched: Map<GameId, Unsubscribe> = new Map();
  readonly #bus: MessageBus;
  readonly #scheduler: Scheduler;
  readonly #onTimeout: RoundTimeoutHandler;
  readonly #logger: Logger | undefined;

  constructor(options: RoundTimeoutWatcherOptions) {
    this.#bus = options.bus;
    this.#scheduler = options.scheduler;
    this.#onTimeout = options.onTimeout;
    this.#logger = options.logger;
  }

  watch(gameId: GameId): void {
    if (this.#watched.has(gameId)) {
      return;
    }

    const unsubscribe = this.#bus.subscribe(gameTopic(gameId), (event) => {
      if (event.type !== "RoundTimeout") {
        return;
      }
      const { roundId } = event;
      this.#scheduler.schedule(0, () =>
        this.#onTimeout(gameId, roundId, this.#scheduler.now()),
      );
    });
    this.#watched.set(gameId, unsubscribe);

    this.#logger?.debug?.("Watching round timeouts", { gameId });
  }

  unwatch(gameId: GameId): void {
    const unsubscribe = this.#watched.get(gameId);
    if (!unsubscribe) {
      return;
    }
    unsubscribe();
    this.#watched.delete(gameId);
  }

  stop(): void {
    for (const gameId of [...this.#watched.keys()]) {
      this.unwatch(gameId);
    }
  }
}
