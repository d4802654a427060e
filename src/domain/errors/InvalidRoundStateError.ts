import type { RoundId, RoundLifecycleState } from "../typedefs.js";

export class InvalidRoundStateError extends Error {
  constructor(
    public readonly roundId: RoundId,
    public readonly state: RoundLifecycleState,
    public readonly reason: string,
  ) {
    super(`Invalid round state for ${roundId} (${state}): ${reason}`);
    this.name = "InvalidRoundStateError";
  }
}
