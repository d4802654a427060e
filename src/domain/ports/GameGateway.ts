/* eslint-disable functional/prefer-readonly-type */
import type { LeaderboardEntry } from "../events.js";
import type { GameConfig } from "../GameConfig.js";
import type {
  GameId,
  GameLifecycleState,
  PlayerId,
  TimePoint,
} from "../typedefs.js";

export interface GameState {
  readonly id: GameId;
  readonly host: PlayerId;
  readonly config: GameConfig;
  state: GameLifecycleState;
  readonly createdAt: TimePoint;
  startedAt?: TimePoint;
}

export interface PlayerState {
  readonly id: PlayerId;
  readonly gameId: GameId;
  points: number;
  readonly joinedAt: TimePoint;
}

/**
 * Persistence abstraction for games and their players.
 * Every method is atomic on its own; callers never hold a transaction open.
 */
export interface GameGateway {
  createGame(host: PlayerId, config: GameConfig, at: TimePoint): Promise<GameState>;

  /** Load a game or fail with {@link GameNotFoundError} */
  loadGame(gameId: GameId): Promise<GameState>;

  /** Like {@link loadGame} but resolves to undefined for unknown games */
  findGame(gameId: GameId): Promise<GameState | undefined>;

  markGameState(gameId: GameId, state: GameLifecycleState): Promise<GameState>;

  /** Move a lobby into `game_running`, stamping `startedAt` */
  startGame(gameId: GameId, at: TimePoint): Promise<GameState>;

  listGamesInState(state: GameLifecycleState): Promise<readonly GameState[]>;

  /** Delete the game together with its players */
  deleteGame(gameId: GameId): Promise<void>;

  /**
   * Add a player to the game. Resolves `inserted: false` when the player is
   * already part of it.
   */
  addPlayer(
    gameId: GameId,
    playerId: PlayerId,
    at: TimePoint,
  ): Promise<{ readonly inserted: boolean; readonly players: readonly PlayerState[] }>;

  /** Resolves false when the player was not part of the game */
  removePlayer(gameId: GameId, playerId: PlayerId): Promise<boolean>;

  /** Players in join order */
  listPlayers(gameId: GameId): Promise<readonly PlayerState[]>;

  addPoints(gameId: GameId, playerId: PlayerId, points: number): Promise<PlayerState>;

  /** Players ordered by points (desc) then by join time (asc) */
  leaderboard(gameId: GameId): Promise<readonly LeaderboardEntry[]>;
}
