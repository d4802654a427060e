/* eslint-disable functional/prefer-readonly-type */
import type { SessionConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { RoundGateway } from "../ports/RoundGateway.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { GameId, RoundId } from "../typedefs.js";
import { GameSession, type SessionSnapshot } from "./GameSession.js";

export type SessionStateResult =
  | { readonly status: "running"; readonly state: SessionSnapshot }
  | { readonly status: "not_running"; readonly gameId: GameId };

/**
 * What commands need from the set of live sessions. Starting a timer creates
 * the game's session on demand; the other operations leave absent sessions
 * absent.
 */
export interface GameSessions {
  startRoundTimer(gameId: GameId, roundId: RoundId, intervalSeconds: number): Promise<void>;
  stopRoundTimer(gameId: GameId): Promise<void>;
  pauseTimer(gameId: GameId): Promise<void>;
  getState(gameId: GameId): Promise<SessionStateResult>;
  /** Stop the session and forget it. Resolves false when none was running. */
  terminate(gameId: GameId): Promise<boolean>;
}

export interface SessionRegistryOptions {
  readonly roundGateway: Pick<RoundGateway, "loadRound">;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly config: Pick<SessionConfig, "tickIntervalMs">;
  readonly logger?: Logger;
}

export class SessionRegistry implements GameSessions {
  #sessions: Map<GameId, GameSession> = new Map();
  readonly #options: SessionRegistryOptions;

  constructor(options: SessionRegistryOptions) {
    this.#options = options;
  }

  get size(): number {
    return this.#sessions.size;
  }

  lookup(gameId: GameId): GameSession | undefined {
    return this.#sessions.get(gameId);
  }

  async startRoundTimer(
    gameId: GameId,
    roundId: RoundId,
    intervalSeconds: number,
  ): Promise<void> {
    await this.#ensure(gameId).startRoundTimer(roundId, intervalSeconds);
  }

  async stopRoundTimer(gameId: GameId): Promise<void> {
    const session = this.#sessions.get(gameId);
    if (!session) {
      this.#options.logger?.debug?.("Stop ignored; no session running", { gameId });
      return;
    }
    await session.stopRoundTimer();
  }

  async pauseTimer(gameId: GameId): Promise<void> {
    const session = this.#sessions.get(gameId);
    if (!session) {
      this.#options.logger?.debug?.("Pause ignored; no session running", { gameId });
      return;
    }
    await session.pauseTimer();
  }

  async getState(gameId: GameId): Promise<SessionStateResult> {
    const session = this.#sessions.get(gameId);
    if (!session) {
      return { status: "not_running", gameId };
    }
    return { status: "running", state: await session.getState() };
  }

  async terminate(gameId: GameId): Promise<boolean> {
    const session = this.#sessions.get(gameId);
    if (!session) {
      return false;
    }
    this.#sessions.delete(gameId);
    await session.terminate();
    return true;
  }

  async terminateAll(): Promise<void> {
    const gameIds = [...this.#sessions.keys()];
    await Promise.all(gameIds.map((gameId) => this.terminate(gameId)));
  }

  #ensure(gameId: GameId): GameSession {
    const existing = this.#sessions.get(gameId);
    if (existing) {
      return existing;
    }

    const { roundGateway, bus, scheduler, config, logger } = this.#options;
    const session = new GameSession({
      gameId,
      roundGateway,
      bus,
      scheduler,
      tickIntervalMs: config.tickIntervalMs,
      logger,
    });
    this.#sessions.set(gameId, session);

    logger?.info?.("Session created", { gameId, sessions: this.#sessions.size });
    return session;
  }
}
