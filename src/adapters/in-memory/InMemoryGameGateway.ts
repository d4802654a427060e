/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { GameNotFoundError } from "../../domain/errors/GameNotFoundError.js";
import { InvalidGameStateError } from "../../domain/errors/InvalidGameStateError.js";
import type { LeaderboardEntry } from "../../domain/events.js";
import type { GameConfig } from "../../domain/GameConfig.js";
import type {
  GameGateway,
  GameState,
  PlayerState,
} from "../../domain/ports/GameGateway.js";
import type {
  GameId,
  GameLifecycleState,
  PlayerId,
  TimePoint,
} from "../../domain/typedefs.js";

export class InMemoryGameGateway implements GameGateway {
  #games = new Map<GameId, GameState>();
  #players = new Map<GameId, PlayerState[]>();
  #nextId = 1;

  async createGame(host: PlayerId, config: GameConfig, at: TimePoint): Promise<GameState> {
    const id: GameId = `game-${this.#nextId++}`;
    const state: GameState = {
      id,
      host,
      config: { ...config },
      state: "waiting_for_players",
      createdAt: at,
    };
    this.#games.set(id, state);
    this.#players.set(id, []);
    return clone(state);
  }

  async loadGame(gameId: GameId): Promise<GameState> {
    return clone(this.#require(gameId));
  }

  async findGame(gameId: GameId): Promise<GameState | undefined> {
    const state = this.#games.get(gameId);
    return state ? clone(state) : undefined;
  }

  async markGameState(gameId: GameId, state: GameLifecycleState): Promise<GameState> {
    const game = this.#require(gameId);
    game.state = state;
    return clone(game);
  }

  async startGame(gameId: GameId, at: TimePoint): Promise<GameState> {
    const game = this.#require(gameId);
    if (game.state !== "waiting_for_players") {
      throw new InvalidGameStateError(gameId, game.state, "only a lobby can be started");
    }
    game.state = "game_running";
    game.startedAt = at;
    return clone(game);
  }

  async listGamesInState(state: GameLifecycleState): Promise<readonly GameState[]> {
    return [...this.#games.values()].filter((game) => game.state === state).map(clone);
  }

  async deleteGame(gameId: GameId): Promise<void> {
    this.#require(gameId);
    this.#games.delete(gameId);
    this.#players.delete(gameId);
  }

  async addPlayer(
    gameId: GameId,
    playerId: PlayerId,
    at: TimePoint,
  ): Promise<{ readonly inserted: boolean; readonly players: readonly PlayerState[] }> {
    this.#require(gameId);
    const players = this.#playersOf(gameId);

    const inserted = !players.some((player) => player.id === playerId);
    if (inserted) {
      players.push({ id: playerId, gameId, points: 0, joinedAt: at });
    }

    return { inserted, players: players.map(clone) };
  }

  async removePlayer(gameId: GameId, playerId: PlayerId): Promise<boolean> {
    const players = this.#playersOf(gameId);
    const index = players.findIndex((player) => player.id === playerId);
    if (index === -1) {
      return false;
    }
    players.splice(index, 1);
    return true;
  }

  async listPlayers(gameId: GameId): Promise<readonly PlayerState[]> {
    return this.#playersOf(gameId).map(clone);
  }

  async addPoints(gameId: GameId, playerId: PlayerId, points: number): Promise<PlayerState> {
    const player = this.#playersOf(gameId).find((candidate) => candidate.id === playerId);
    if (!player) {
      throw new Error(`Player ${playerId} is not part of game ${gameId}`);
    }
    player.points += points;
    return clone(player);
  }

  async leaderboard(gameId: GameId): Promise<readonly LeaderboardEntry[]> {
    return [...this.#playersOf(gameId)]
      .sort((a, b) => b.points - a.points || a.joinedAt - b.joinedAt)
      .map(({ id, points }) => ({ playerId: id, points }));
  }

  #require(gameId: GameId): GameState {
    const state = this.#games.get(gameId);
    if (!state) {
      throw new GameNotFoundError(gameId);
    }
    return state;
  }

  #playersOf(gameId: GameId): PlayerState[] {
    return this.#players.get(gameId) ?? [];
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
