import type { GameConfig } from "./GameConfig.js";
import type {
  GameId,
  PlayerId,
  RoundId,
  TimePoint,
  WordId,
} from "./typedefs.js";

/** Topic every player and host of a game listens on */
export function gameTopic(gameId: GameId): string {
  return `game:${gameId}`;
}

/** Host-only topic; carries presence diffs for the host's connections */
export function hostTopic(gameId: GameId): string {
  return `game:${gameId}:host`;
}

export type PresenceMeta = Readonly<Record<string, unknown>>;

/** Connection keys mapped to the metadata they were tracked with */
export type PresenceEntries = Readonly<Record<string, PresenceMeta>>;

export interface LeaderboardEntry {
  readonly playerId: PlayerId;
  readonly points: number;
}

export interface PickSummary {
  readonly playerId: PlayerId;
  readonly wordId: WordId;
  readonly isCorrect: boolean;
  readonly keywordsShown: number;
  readonly time: number;
}

export type GameEvent =
  | {
      readonly type: "GameCreated";
      readonly gameId: GameId;
      readonly host: PlayerId;
      readonly config: GameConfig;
      readonly at: TimePoint;
    }
  | {
      readonly type: "PlayerJoined";
      readonly gameId: GameId;
      readonly playerId: PlayerId;
      readonly players: readonly PlayerId[];
      readonly at: TimePoint;
    }
  | {
      readonly type: "PlayerLeft";
      readonly gameId: GameId;
      readonly playerId: PlayerId;
      readonly players: readonly PlayerId[];
      readonly at: TimePoint;
    }
  | {
      readonly type: "GameStarted";
      readonly gameId: GameId;
      readonly roundsCount: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "RoundStarted";
      readonly gameId: GameId;
      readonly roundId: RoundId;
      readonly position: number;
      readonly possibleWordIds: readonly WordId[];
      readonly keywordsTotal: number;
      readonly cluesIntervalSeconds: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "KeywordRevealed";
      readonly gameId: GameId;
      readonly roundId: RoundId;
      readonly revealCount: number;
      readonly elapsedSeconds: number;
    }
  | {
      readonly type: "PickRecorded";
      readonly gameId: GameId;
      readonly roundId: RoundId;
      readonly playerId: PlayerId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "AllPlayersPicked";
      readonly gameId: GameId;
      readonly roundId: RoundId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "RoundTimeout";
      readonly gameId: GameId;
      readonly roundId: RoundId;
    }
  | {
      readonly type: "RoundFinished";
      readonly gameId: GameId;
      readonly roundId: RoundId;
      readonly wordId: WordId;
      readonly reason: RoundFinishReason;
      readonly picks: readonly PickSummary[];
      readonly at: TimePoint;
    }
  | {
      readonly type: "GameOver";
      readonly gameId: GameId;
      readonly leaderboard: readonly LeaderboardEntry[];
      readonly at: TimePoint;
    }
  | {
      readonly type: "GameStoppedByHost";
      readonly gameId: GameId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "GameCancelled";
      readonly gameId: GameId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "HostDisconnected";
      readonly gameId: GameId;
      readonly at: TimePoint;
    }
  | {
      readonly type: "LobbyTimedOut";
      readonly gameId: GameId;
      readonly at: TimePoint;
    };

/** Presence change on a topic, in the joins/leaves shape clients expect */
export interface PresenceDiff {
  readonly type: "PresenceDiff";
  readonly topic: string;
  readonly joins: PresenceEntries;
  readonly leaves: PresenceEntries;
}

export type RoundFinishReason = "all_picked" | "timeout";

export type BusEvent = GameEvent | PresenceDiff;

export type BusEventType = BusEvent["type"];

export type BusEventOf<TType extends BusEventType> = Extract<BusEvent, { type: TType }>;
