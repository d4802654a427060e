/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { assertRoundTransition } from "../../domain/entities/RoundRules.js";
import {
  DuplicatePickError,
  InvalidRoundStateError,
  RoundNotFoundError,
} from "../../domain/errors/index.js";
import type { GameGateway } from "../../domain/ports/GameGateway.js";
import type {
  PickAppendResult,
  PickInput,
  PickState,
  RoundDraft,
  RoundGateway,
  RoundState,
} from "../../domain/ports/RoundGateway.js";
import type { GameId, PlayerId, RoundId } from "../../domain/typedefs.js";

/**
 * Rounds and picks kept in process memory. Player counts come from the game
 * gateway, read before any pick is written so that the insert and the
 * "everyone picked" check happen in one synchronous step.
 */
export class InMemoryRoundGateway implements RoundGateway {
  #rounds = new Map<RoundId, RoundState>();
  #picks = new Map<RoundId, PickState[]>();
  readonly #players: Pick<GameGateway, "listPlayers">;
  #nextRoundId = 1;
  #nextPickId = 1;

  constructor(players: Pick<GameGateway, "listPlayers">) {
    this.#players = players;
  }

  async loadRound(roundId: RoundId): Promise<RoundState> {
    return clone(this.#require(roundId));
  }

  async createRounds(
    gameId: GameId,
    drafts: readonly RoundDraft[],
  ): Promise<readonly RoundState[]> {
    const existing = this.#roundsOf(gameId);
    const offset = existing.reduce((max, round) => Math.max(max, round.position), 0);

    const created = drafts.map((draft, index): RoundState => ({
      id: `round-${this.#nextRoundId++}`,
      gameId,
      position: offset + index + 1,
      state: "on_hold",
      wordId: draft.wordId,
      keywordIds: [...draft.keywordIds],
      possibleWordIds: [...draft.possibleWordIds],
    }));

    for (const round of created) {
      this.#rounds.set(round.id, round);
      this.#picks.set(round.id, []);
    }

    return created.map(clone);
  }

  async currentRound(gameId: GameId): Promise<RoundState | undefined> {
    const rounds = this.#roundsOf(gameId);
    const current =
      rounds.find((round) => round.state === "playing") ??
      rounds.find((round) => round.state === "on_hold");
    return current ? clone(current) : undefined;
  }

  async activateNextRound(gameId: GameId): Promise<RoundState | undefined> {
    const rounds = this.#roundsOf(gameId);

    const playing = rounds.find((round) => round.state === "playing");
    if (playing) {
      throw new InvalidRoundStateError(
        playing.id,
        playing.state,
        "another round of this game is still playing",
      );
    }

    const next = rounds.find((round) => round.state === "on_hold");
    if (!next) {
      return undefined;
    }

    assertRoundTransition(next, "playing");
    const activated: RoundState = { ...next, state: "playing" };
    this.#rounds.set(activated.id, activated);
    return clone(activated);
  }

  async finishRound(roundId: RoundId): Promise<boolean> {
    const round = this.#require(roundId);
    if (round.state !== "playing") {
      return false;
    }
    this.#rounds.set(roundId, { ...round, state: "finished" });
    return true;
  }

  async createPick(
    roundId: RoundId,
    playerId: PlayerId,
    pick: PickInput,
  ): Promise<PickAppendResult> {
    const round = this.#require(roundId);
    const players = await this.#players.listPlayers(round.gameId);

    const current = this.#require(roundId);
    if (current.state !== "playing") {
      throw new InvalidRoundStateError(roundId, current.state, "picks are only accepted while playing");
    }
    const picks = this.#picks.get(roundId) ?? [];
    if (picks.some((existing) => existing.playerId === playerId)) {
      throw new DuplicatePickError(roundId, playerId);
    }

    const stored: PickState = {
      id: `pick-${this.#nextPickId++}`,
      roundId,
      playerId,
      ...pick,
    };
    picks.push(stored);
    this.#picks.set(roundId, picks);

    return {
      pick: clone(stored),
      allPicked: countPickers(picks, players) === players.length,
    };
  }

  async playersHaveAllPicked(gameId: GameId, roundId: RoundId): Promise<boolean> {
    const round = this.#require(roundId);
    if (round.gameId !== gameId) {
      throw new RoundNotFoundError(roundId);
    }
    const players = await this.#players.listPlayers(gameId);
    return countPickers(this.#picks.get(roundId) ?? [], players) === players.length;
  }

  async listPicks(roundId: RoundId): Promise<readonly PickState[]> {
    this.#require(roundId);
    return (this.#picks.get(roundId) ?? []).map(clone);
  }

  #require(roundId: RoundId): RoundState {
    const round = this.#rounds.get(roundId);
    if (!round) {
      throw new RoundNotFoundError(roundId);
    }
    return round;
  }

  #roundsOf(gameId: GameId): RoundState[] {
    return [...this.#rounds.values()]
      .filter((round) => round.gameId === gameId)
      .sort((a, b) => a.position - b.position);
  }
}

/** Picks made by players who are still part of the game */
function countPickers(
  picks: readonly PickState[],
  players: readonly { readonly id: PlayerId }[],
): number {
  const ids = new Set(players.map((player) => player.id));
  return picks.filter((pick) => ids.has(pick.playerId)).length;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
