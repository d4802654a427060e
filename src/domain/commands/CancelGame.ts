import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { gameTopic } from "../events.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class CancelGame extends Command {
  readonly type = "CancelGame" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly requestedBy: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gameGateway, bus, logger, hostMonitor }: CommandContext): Promise<void> {
    const game = await gameGateway.loadGame(this.gameId);

    if (this.requestedBy !== game.host) {
      throw GameCommandInputError.because(["Only the host can cancel the game"]);
    }

    if (game.state !== "waiting_for_players") {
      throw new InvalidGameStateError(game.id, game.state, "only a lobby can be cancelled");
    }

    await gameGateway.deleteGame(game.id);
    hostMonitor?.unmonitorGameHost(game.id);

    logger?.info?.("Game cancelled", { type: this.type, gameId: game.id, at: this.at });

    await bus.publish(gameTopic(game.id), {
      type: "GameCancelled",
      gameId: game.id,
      at: this.at,
    });
  }
}
