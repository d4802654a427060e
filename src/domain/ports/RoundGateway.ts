import type {
  GameId,
  KeywordId,
  PlayerId,
  RoundId,
  RoundLifecycleState,
  TimePoint,
  WordId,
} from "../typedefs.js";

/** Content for one round, as drawn from the word catalog */
export interface RoundDraft {
  readonly wordId: WordId;
  /** Clue sequence; revealed in this order */
  readonly keywordIds: readonly KeywordId[];
  /** Words shown in the grid; always contains {@link wordId} */
  readonly possibleWordIds: readonly WordId[];
}

export interface RoundState extends RoundDraft {
  readonly id: RoundId;
  readonly gameId: GameId;
  /** 1-based, unique per game */
  readonly position: number;
  readonly state: RoundLifecycleState;
}

export interface PickState {
  readonly id: string;
  readonly roundId: RoundId;
  readonly playerId: PlayerId;
  readonly wordId: WordId;
  /** Elapsed seconds of the round when the pick was made */
  readonly time: number;
  readonly keywordsShown: number;
  readonly isCorrect: boolean;
  readonly pickedAt: TimePoint;
}

export type PickInput = Omit<PickState, "id" | "roundId" | "playerId">;

export interface PickAppendResult {
  readonly pick: PickState;
  /** Whether every player of the game has now picked, evaluated in the same write */
  readonly allPicked: boolean;
}

/**
 * Persistence abstraction for rounds and picks.
 * Implementations must handle atomicity, concurrency, and consistency internally.
 */
export interface RoundGateway {
  /** Load a round or fail with {@link RoundNotFoundError} */
  loadRound(roundId: RoundId): Promise<RoundState>;

  /** Store drafts as `on_hold` rounds at positions 1..n */
  createRounds(gameId: GameId, drafts: readonly RoundDraft[]): Promise<readonly RoundState[]>;

  /** The `playing` round, or else the first `on_hold` one */
  currentRound(gameId: GameId): Promise<RoundState | undefined>;

  /**
   * Promote the lowest-positioned `on_hold` round to `playing`.
   * Resolves undefined when none is left. Fails with
   * {@link InvalidRoundStateError} when another round is still playing.
   */
  activateNextRound(gameId: GameId): Promise<RoundState | undefined>;

  /**
   * Move a `playing` round to `finished`. Resolves false (and changes nothing)
   * when the round was not playing.
   */
  finishRound(roundId: RoundId): Promise<boolean>;

  /**
   * Insert a pick and evaluate whether every player has picked, in one
   * atomic step. Fails with {@link DuplicatePickError} on a second pick for the
   * same (round, player), and with {@link InvalidRoundStateError} once the
   * round is no longer `playing`.
   */
  createPick(roundId: RoundId, playerId: PlayerId, pick: PickInput): Promise<PickAppendResult>;

  playersHaveAllPicked(gameId: GameId, roundId: RoundId): Promise<boolean>;

  /** Picks in the order they were made */
  listPicks(roundId: RoundId): Promise<readonly PickState[]>;
}
