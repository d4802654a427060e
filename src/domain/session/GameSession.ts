/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import {
  isRevealTick,
  isRevealTimelineComplete,
} from "../entities/RoundRules.js";
import { gameTopic } from "../events.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { RoundGateway } from "../ports/RoundGateway.js";
import type { ScheduledHandle, Scheduler } from "../ports/Scheduler.js";
import type { GameId, RoundId } from "../typedefs.js";

export type SessionStatus = "idle" | "playing";

/** Diagnostic copy of a session's counters */
export interface SessionSnapshot {
  readonly gameId: GameId;
  readonly roundId: RoundId | undefined;
  readonly cluesIntervalSeconds: number | undefined;
  readonly elapsedSeconds: number;
  readonly keywordsRevealed: number;
  readonly keywordsTotal: number;
  readonly status: SessionStatus;
  readonly timeoutScheduled: boolean;
  readonly paused: boolean;
}

export interface GameSessionOptions {
  readonly gameId: GameId;
  readonly roundGateway: Pick<RoundGateway, "loadRound">;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  /** Wall-clock length of one tick; every tick counts as one elapsed second */
  readonly tickIntervalMs: number;
  readonly logger?: Logger;
}

interface Counters {
  roundId: RoundId | undefined;
  cluesIntervalSeconds: number | undefined;
  elapsedSeconds: number;
  keywordsRevealed: number;
  keywordsTotal: number;
  status: SessionStatus;
  timeoutScheduled: boolean;
  paused: boolean;
}

/**
 * Every deferred message carries the round it was scheduled for plus a
 * generation. Ticks use the tick generation, bumped on every start, stop,
 * pause and resume. Timeouts use the run generation, bumped on a fresh start
 * and on stop only, so a pause does not swallow a timeout that is already due.
 */
type SessionMessage =
  | { readonly kind: "start"; readonly roundId: RoundId; readonly intervalSeconds: number }
  | { readonly kind: "stop" }
  | { readonly kind: "pause" }
  | { readonly kind: "tick"; readonly roundId: RoundId; readonly generation: number }
  | { readonly kind: "timeout"; readonly roundId: RoundId; readonly run: number }
  | { readonly kind: "terminate" };

const IDLE: Omit<Counters, "roundId"> = {
  cluesIntervalSeconds: undefined,
  elapsedSeconds: 0,
  keywordsRevealed: 0,
  keywordsTotal: 0,
  status: "idle",
  timeoutScheduled: false,
  paused: false,
};

/**
 * Authoritative clock for the current round of one game.
 *
 * All operations go through a private mailbox and are handled strictly one
 * after another, so counters are never touched concurrently. Timer messages
 * are stale-checked when they are consumed rather than relying on
 * cancellation.
 */
export class GameSession {
  readonly gameId: GameId;
  readonly #roundGateway: GameSessionOptions["roundGateway"];
  readonly #bus: MessageBus;
  readonly #scheduler: Scheduler;
  readonly #tickIntervalMs: number;
  readonly #logger: Logger | undefined;

  #counters: Counters = { roundId: undefined, ...IDLE };
  #tickGeneration = 0;
  #run = 0;
  #tickHandle: ScheduledHandle | undefined;
  #timeoutHandle: ScheduledHandle | undefined;
  #terminated = false;
  #mailbox: Promise<void> = Promise.resolve();

  constructor(options: GameSessionOptions) {
    if (!Number.isFinite(options.tickIntervalMs) || options.tickIntervalMs <= 0) {
      throw new Error("Tick interval must be positive");
    }

    this.gameId = options.gameId;
    this.#roundGateway = options.roundGateway;
    this.#bus = options.bus;
    this.#scheduler = options.scheduler;
    this.#tickIntervalMs = options.tickIntervalMs;
    this.#logger = options.logger;
  }

  get terminated(): boolean {
    return this.#terminated;
  }

  startRoundTimer(roundId: RoundId, intervalSeconds: number): Promise<void> {
    if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
      return Promise.reject(new Error("Clue interval must be a positive integer"));
    }
    return this.#send({ kind: "start", roundId, intervalSeconds });
  }

  stopRoundTimer(): Promise<void> {
    return this.#send({ kind: "stop" });
  }

  pauseTimer(): Promise<void> {
    return this.#send({ kind: "pause" });
  }

  terminate(): Promise<void> {
    return this.#send({ kind: "terminate" });
  }

  getState(): Promise<SessionSnapshot> {
    return this.#enqueue(() => this.#snapshot());
  }

  #send(message: SessionMessage): Promise<void> {
    return this.#enqueue(() => this.#handle(message));
  }

  #enqueue<T>(handler: () => Promise<T> | T): Promise<T> {
    const result = this.#mailbox.then(handler);
    // Failures reach the sender through `result`; the mailbox keeps going.
    this.#mailbox = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async #handle(message: SessionMessage): Promise<void> {
    if (this.#terminated) {
      this.#logger?.debug?.("Session message dropped; session terminated", {
        gameId: this.gameId,
        kind: message.kind,
      });
      return;
    }

    switch (message.kind) {
      case "start":
        await this.#handleStart(message.roundId, message.intervalSeconds);
        return;
      case "stop":
        this.#handleStop();
        return;
      case "pause":
        this.#handlePause();
        return;
      case "tick":
        await this.#handleTick(message.roundId, message.generation);
        return;
      case "timeout":
        await this.#handleTimeout(message.roundId, message.run);
        return;
      case "terminate":
        this.#handleTerminate();
        return;
    }
  }

  async #handleStart(roundId: RoundId, intervalSeconds: number): Promise<void> {
    const current = this.#counters;
    if (current.paused && current.status === "playing" && current.roundId === roundId) {
      this.#cancelTick();
      this.#tickGeneration += 1;
      this.#counters = { ...current, paused: false };
      this.#scheduleTick(roundId);

      this.#logger?.info?.("Round timer resumed", {
        gameId: this.gameId,
        roundId,
        elapsedSeconds: current.elapsedSeconds,
        keywordsRevealed: current.keywordsRevealed,
      });
      return;
    }

    const round = await this.#roundGateway.loadRound(roundId);
    const keywordsTotal = round.keywordIds.length;

    this.#cancelTick();
    this.#cancelTimeout();
    this.#tickGeneration += 1;
    this.#run += 1;

    this.#counters = {
      roundId,
      cluesIntervalSeconds: intervalSeconds,
      elapsedSeconds: 0,
      keywordsRevealed: 1,
      keywordsTotal,
      status: "playing",
      timeoutScheduled: false,
      paused: false,
    };
    this.#scheduleTick(roundId);

    this.#logger?.info?.("Round timer started", {
      gameId: this.gameId,
      roundId,
      intervalSeconds,
      keywordsTotal,
    });

    await this.#bus.publish(gameTopic(this.gameId), {
      type: "KeywordRevealed",
      gameId: this.gameId,
      roundId,
      revealCount: 1,
      elapsedSeconds: 0,
    });
  }

  #handleStop(): void {
    this.#cancelTick();
    this.#cancelTimeout();
    this.#tickGeneration += 1;
    this.#run += 1;
    this.#counters = { ...this.#counters, ...IDLE };

    this.#logger?.info?.("Round timer stopped", {
      gameId: this.gameId,
      roundId: this.#counters.roundId,
    });
  }

  #handlePause(): void {
    this.#cancelTick();
    this.#tickGeneration += 1;
    this.#counters = { ...this.#counters, paused: true };

    this.#logger?.info?.("Round timer paused", {
      gameId: this.gameId,
      roundId: this.#counters.roundId,
      elapsedSeconds: this.#counters.elapsedSeconds,
    });
  }

  #handleTerminate(): void {
    this.#cancelTick();
    this.#cancelTimeout();
    this.#tickGeneration += 1;
    this.#run += 1;
    this.#terminated = true;
    this.#counters = { ...this.#counters, ...IDLE };

    this.#logger?.info?.("Session terminated", { gameId: this.gameId });
  }

  async #handleTick(roundId: RoundId, generation: number): Promise<void> {
    const state = this.#counters;

    if (roundId !== state.roundId || generation !== this.#tickGeneration) {
      this.#logger?.debug?.("Ignoring stale tick", {
        gameId: this.gameId,
        roundId,
        currentRoundId: state.roundId,
      });
      return;
    }

    if (state.paused || state.status !== "playing") {
      this.#logger?.debug?.("Ignoring tick; timer not running", {
        gameId: this.gameId,
        roundId,
      });
      return;
    }

    const interval = state.cluesIntervalSeconds ?? 1;
    const elapsedSeconds = state.elapsedSeconds + 1;
    const revealed =
      isRevealTick(elapsedSeconds, interval) && state.keywordsRevealed < state.keywordsTotal;
    const keywordsRevealed = revealed ? state.keywordsRevealed + 1 : state.keywordsRevealed;

    let timeoutScheduled = state.timeoutScheduled;
    if (
      !timeoutScheduled &&
      isRevealTimelineComplete(
        keywordsRevealed,
        elapsedSeconds,
        state.keywordsTotal,
        interval,
      )
    ) {
      this.#scheduleTimeout(roundId);
      timeoutScheduled = true;

      this.#logger?.info?.("Reveal timeline complete; round timeout scheduled", {
        gameId: this.gameId,
        roundId,
        elapsedSeconds,
      });
    }

    this.#counters = { ...state, elapsedSeconds, keywordsRevealed, timeoutScheduled };
    this.#scheduleTick(roundId);

    if (revealed) {
      this.#logger?.debug?.("Keyword revealed", {
        gameId: this.gameId,
        roundId,
        keywordsRevealed,
      });
    }

    await this.#bus.publish(gameTopic(this.gameId), {
      type: "KeywordRevealed",
      gameId: this.gameId,
      roundId,
      revealCount: keywordsRevealed,
      elapsedSeconds,
    });
  }

  async #handleTimeout(roundId: RoundId, run: number): Promise<void> {
    this.#timeoutHandle = undefined;

    if (roundId !== this.#counters.roundId || run !== this.#run) {
      this.#logger?.debug?.("Ignoring stale round timeout", {
        gameId: this.gameId,
        roundId,
        currentRoundId: this.#counters.roundId,
      });
      return;
    }

    this.#logger?.info?.("Round timeout", { gameId: this.gameId, roundId });

    await this.#bus.publish(gameTopic(this.gameId), {
      type: "RoundTimeout",
      gameId: this.gameId,
      roundId,
    });
  }

  #scheduleTick(roundId: RoundId): void {
    const generation = this.#tickGeneration;
    this.#tickHandle = this.#scheduler.schedule(this.#tickIntervalMs, () =>
      this.#send({ kind: "tick", roundId, generation }),
    );
  }

  #scheduleTimeout(roundId: RoundId): void {
    const run = this.#run;
    this.#timeoutHandle = this.#scheduler.schedule(0, () =>
      this.#send({ kind: "timeout", roundId, run }),
    );
  }

  #cancelTick(): void {
    this.#tickHandle?.cancel();
    this.#tickHandle = undefined;
  }

  #cancelTimeout(): void {
    this.#timeoutHandle?.cancel();
    this.#timeoutHandle = undefined;
  }

  #snapshot(): SessionSnapshot {
    return { gameId: this.gameId, ...this.#counters };
  }
}
