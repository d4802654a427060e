import { InvalidRoundStateError } from "../errors/InvalidRoundStateError.js";
import type { RoundDraft, RoundState } from "../ports/RoundGateway.js";
import {
  HOST_BOUND_STATES,
  type GameLifecycleState,
  type RoundLifecycleState,
  type WordId,
} from "../typedefs.js";

export function mulberry32(seed: number): () => number {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher–Yates over a copy of `items` */
export function shuffle<T>(items: readonly T[], rng: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    const current = result[i];
    const swapped = result[j];
    if (current === undefined || swapped === undefined) {
      continue;
    }
    result[i] = swapped;
    result[j] = current;
  }
  return result;
}

// -----------------------------------------------------------------------------
//  Reveal schedule
// -----------------------------------------------------------------------------

/** A keyword is revealed on every positive multiple of the clue interval */
export function isRevealTick(elapsedSeconds: number, intervalSeconds: number): boolean {
  return elapsedSeconds > 0 && elapsedSeconds % intervalSeconds === 0;
}

/**
 * The last keyword's countdown ends at `keywordsTotal * interval`; the round
 * times out once that point is reached with every keyword revealed.
 */
export function isRevealTimelineComplete(
  revealCount: number,
  elapsedSeconds: number,
  keywordsTotal: number,
  intervalSeconds: number,
): boolean {
  return (
    revealCount >= keywordsTotal && elapsedSeconds >= keywordsTotal * intervalSeconds
  );
}

// -----------------------------------------------------------------------------
//  Picks and scoring
// -----------------------------------------------------------------------------

export function isCorrectPick(round: Pick<RoundState, "wordId">, wordId: WordId): boolean {
  return round.wordId === wordId;
}

/**
 * Points for a correct pick, from 5 down to 1 depending on the share of
 * keywords that were visible: `max(1, 6 - ceil(shown / total * 5))`.
 */
export function calculatePoints(keywordsShown: number, keywordsTotal: number): number {
  if (keywordsTotal <= 0) {
    return 1;
  }
  return Math.max(1, 6 - Math.ceil((keywordsShown / keywordsTotal) * 5));
}

// -----------------------------------------------------------------------------
//  Lifecycle guards
// -----------------------------------------------------------------------------

const ROUND_TRANSITIONS: Readonly<Record<RoundLifecycleState, RoundLifecycleState | null>> = {
  on_hold: "playing",
  playing: "finished",
  finished: null,
};

export function assertRoundTransition(
  round: Pick<RoundState, "id" | "state">,
  next: RoundLifecycleState,
): void {
  if (ROUND_TRANSITIONS[round.state] !== next) {
    throw new InvalidRoundStateError(
      round.id,
      round.state,
      `cannot move from ${round.state} to ${next}`,
    );
  }
}

/** Whether a game still depends on its host being connected */
export function isHostBound(state: GameLifecycleState): boolean {
  return HOST_BOUND_STATES.includes(state);
}

export function validateRoundDraft(draft: RoundDraft): readonly string[] {
  const issues: string[] = [];

  if (draft.keywordIds.length === 0) {
    issues.push(`Word ${draft.wordId} has no keywords`);
  }

  if (!draft.possibleWordIds.includes(draft.wordId)) {
    issues.push(`Grid for word ${draft.wordId} does not contain the word itself`);
  }

  if (new Set(draft.possibleWordIds).size !== draft.possibleWordIds.length) {
    issues.push(`Grid for word ${draft.wordId} contains duplicates`);
  }

  return issues;
}
