import type { GameId } from "../typedefs.js";

export class GameNotFoundError extends Error {
  constructor(public readonly gameId: GameId) {
    super(`Game not found: ${gameId}`);
    this.name = "GameNotFoundError";
  }
}
