/**
 * Core domain typedefs used throughout the game.
 * These are simple aliases for now; you can later evolve them into
 * branded types for stronger compile-time safety.
 */

/** Unique identifier of a game */
export type GameId = string;

/** Unique identifier of a round */
export type RoundId = string;

/** Unique identifier of a player (the joining user's identity) */
export type PlayerId = string;

/** Identifier of a word in the content catalog */
export type WordId = string;

/** Identifier of a keyword clue in the content catalog */
export type KeywordId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Lifecycle of a game aggregate */
export type GameLifecycleState =
  | "waiting_for_players"
  | "game_running"
  | "game_over"
  | "lobby_timeout"
  | "host_disconnected";

/** Lifecycle of a single round */
export type RoundLifecycleState = "on_hold" | "playing" | "finished";

/** States in which a game still needs its host to be connected */
export const HOST_BOUND_STATES: readonly GameLifecycleState[] = [
  "waiting_for_players",
  "game_running",
];
