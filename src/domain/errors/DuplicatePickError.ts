import type { PlayerId, RoundId } from "../typedefs.js";

/** Raised by the store when a player already has a pick for the round */
export class DuplicatePickError extends Error {
  constructor(
    public readonly roundId: RoundId,
    public readonly playerId: PlayerId,
  ) {
    super(`Player ${playerId} already picked in round ${roundId}`);
    this.name = "DuplicatePickError";
  }
}
