import type { GameId, GameLifecycleState } from "../typedefs.js";

export class InvalidGameStateError extends Error {
  constructor(
    public readonly gameId: GameId,
    public readonly state: GameLifecycleState,
    public readonly reason: string,
  ) {
    super(`Invalid game state for ${gameId} (${state}): ${reason}`);
    this.name = "InvalidGameStateError";
  }
}
