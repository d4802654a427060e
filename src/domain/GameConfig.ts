export const ALLOWED_CLUES_INTERVALS = [3, 6, 9, 12, 15, 20, 30, 45, 60] as const;
export const ALLOWED_GRID_SIZES = [2, 4, 9, 16] as const;
export const MAX_ROUNDS = 20;

export interface GameConfig {
  readonly roundsCount: number;
  /** Seconds between two keyword reveals */
  readonly cluesIntervalSeconds: number;
  /** Number of candidate words shown to players each round */
  readonly gridSize: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    roundsCount: overrides.roundsCount ?? 3,
    cluesIntervalSeconds: overrides.cluesIntervalSeconds ?? 15,
    gridSize: overrides.gridSize ?? 9,
  };
}

export function validateGameConfig(config: GameConfig): readonly string[] {
  const issues: string[] = [];

  if (
    !Number.isInteger(config.roundsCount) ||
    config.roundsCount < 1 ||
    config.roundsCount > MAX_ROUNDS
  ) {
    issues.push(`roundsCount must be an integer between 1 and ${MAX_ROUNDS}`);
  }

  if (!isOneOf(ALLOWED_CLUES_INTERVALS, config.cluesIntervalSeconds)) {
    issues.push(
      `cluesIntervalSeconds must be one of ${ALLOWED_CLUES_INTERVALS.join(", ")}`,
    );
  }

  if (!isOneOf(ALLOWED_GRID_SIZES, config.gridSize)) {
    issues.push(`gridSize must be one of ${ALLOWED_GRID_SIZES.join(", ")}`);
  }

  return issues;
}

/**
 * Process-wide timing policy. Every value is a policy constant rather than
 * something derived, so deployments can tune them.
 */
export interface SessionConfig {
  /** Period of the session tick; one tick advances the elapsed counter by one second */
  readonly tickIntervalMs: number;
  /** How long the host topic must stay empty before the game is cleaned up */
  readonly hostDisconnectDebounceMs: number;
  /** Pause between the last pick of a round and advancing to the next one */
  readonly feedbackDelayMs: number;
  /** Age after which an unstarted lobby times out */
  readonly lobbyTimeoutMs: number;
  /** Period of the lobby timeout sweep */
  readonly lobbySweepIntervalMs: number;
}

export type SessionConfigOverrides = Partial<SessionConfig>;

export function createSessionConfig(
  overrides: SessionConfigOverrides = {},
): SessionConfig {
  return {
    tickIntervalMs: overrides.tickIntervalMs ?? 1_000,
    hostDisconnectDebounceMs: overrides.hostDisconnectDebounceMs ?? 2_000,
    feedbackDelayMs: overrides.feedbackDelayMs ?? 3_000,
    lobbyTimeoutMs: overrides.lobbyTimeoutMs ?? 15 * 60_000,
    lobbySweepIntervalMs: overrides.lobbySweepIntervalMs ?? 5 * 60_000,
  };
}

function isOneOf(allowed: readonly number[], value: number): boolean {
  return allowed.includes(value);
}
