/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { isHostBound } from "../entities/RoundRules.js";
import { hostTopic, type BusEvent } from "../events.js";
import type { GameGateway } from "../ports/GameGateway.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus, Unsubscribe } from "../ports/MessageBus.js";
import type { PresenceTracker } from "../ports/PresenceTracker.js";
import type { ScheduledHandle, Scheduler } from "../ports/Scheduler.js";
import type { GameId } from "../typedefs.js";

export interface HostMonitor {
  /** Start watching the host topic of a game. Calling it again is a no-op. */
  monitorGameHost(gameId: GameId): void;
  /** Stop watching a game that ended through some other path */
  unmonitorGameHost(gameId: GameId): void;
}

export type HostCleanup = (gameId: GameId) => Promise<void>;

export interface HostPresenceMonitorOptions {
  readonly bus: MessageBus;
  readonly presence: Pick<PresenceTracker, "list">;
  readonly gameGateway: Pick<GameGateway, "findGame">;
  readonly scheduler: Scheduler;
  /** How long the host topic must stay empty before cleanup runs */
  readonly debounceMs: number;
  readonly cleanup: HostCleanup;
  readonly logger?: Logger;
}

/**
 * Watches host presence for every monitored game and tears a game down once
 * its host has been gone for a whole debounce window.
 *
 * A page navigation produces a leave immediately followed by a join; the
 * delayed re-check sees the host again and does nothing. Each leave replaces
 * the game's pending re-check, so the window counts from the latest leave.
 */
export class HostPresenceMonitor implements HostMonitor {
  readonly #bus: MessageBus;
  readonly #presence: HostPresenceMonitorOptions["presence"];
  readonly #gameGateway: HostPresenceMonitorOptions["gameGateway"];
  readonly #scheduler: Scheduler;
  readonly #debounceMs: number;
  readonly #cleanup: HostCleanup;
  readonly #logger: Logger | undefined;

  #monitored: Map<GameId, Unsubscribe> = new Map();
  #pendingChecks: Map<GameId, ScheduledHandle> = new Map();

  constructor(options: HostPresenceMonitorOptions) {
    if (!Number.isFinite(options.debounceMs) || options.debounceMs < 0) {
      throw new Error("Debounce window must be non-negative");
    }

    this.#bus = options.bus;
    this.#presence = options.presence;
    this.#gameGateway = options.gameGateway;
    this.#scheduler = options.scheduler;
    this.#debounceMs = options.debounceMs;
    this.#cleanup = options.cleanup;
    this.#logger = options.logger;
  }

  get monitoredGames(): ReadonlySet<GameId> {
    return new Set(this.#monitored.keys());
  }

  isMonitoring(gameId: GameId): boolean {
    return this.#monitored.has(gameId);
  }

  monitorGameHost(gameId: GameId): void {
    if (this.#monitored.has(gameId)) {
      return;
    }

    const unsubscribe = this.#bus.subscribe(hostTopic(gameId), (event) =>
      this.#onHostEvent(gameId, event),
    );
    this.#monitored.set(gameId, unsubscribe);

    this.#logger?.info?.("Monitoring host presence", {
      gameId,
      monitored: this.#monitored.size,
    });
  }

  unmonitorGameHost(gameId: GameId): void {
    this.#forget(gameId);
  }

  stop(): void {
    for (const gameId of [...this.#monitored.keys()]) {
      this.#forget(gameId);
    }
  }

  #onHostEvent(gameId: GameId, event: BusEvent): void {
    if (event.type !== "PresenceDiff" || Object.keys(event.leaves).length === 0) {
      return;
    }
    if (!this.#monitored.has(gameId)) {
      return;
    }

    this.#pendingChecks.get(gameId)?.cancel();
    this.#pendingChecks.set(
      gameId,
      this.#scheduler.schedule(this.#debounceMs, () => this.#recheck(gameId)),
    );

    this.#logger?.debug?.("Host left; re-check scheduled", {
      gameId,
      debounceMs: this.#debounceMs,
    });
  }

  async #recheck(gameId: GameId): Promise<void> {
    this.#pendingChecks.delete(gameId);

    if (!this.#monitored.has(gameId)) {
      return;
    }

    const present = await this.#presence.list(hostTopic(gameId));
    if (Object.keys(present).length > 0) {
      this.#logger?.debug?.("Host is back; no cleanup", { gameId });
      return;
    }

    const game = await this.#gameGateway.findGame(gameId);
    if (!game || !isHostBound(game.state)) {
      this.#logger?.debug?.("Host gone from an ended game; monitoring stopped", {
        gameId,
        state: game?.state,
      });
      this.#forget(gameId);
      return;
    }

    this.#logger?.info?.("Host disconnected; cleaning up game", {
      gameId,
      state: game.state,
    });

    try {
      await this.#cleanup(gameId);
    } finally {
      this.#forget(gameId);
    }
  }

  #forget(gameId: GameId): void {
    this.#pendingChecks.get(gameId)?.cancel();
    this.#pendingChecks.delete(gameId);

    const unsubscribe = this.#monitored.get(gameId);
    if (!unsubscribe) {
      return;
    }
    unsubscribe();
    this.#monitored.delete(gameId);

    this.#logger?.info?.("Stopped monitoring host presence", {
      gameId,
      monitored: this.#monitored.size,
    });
  }
}
