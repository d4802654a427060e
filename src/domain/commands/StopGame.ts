import { isHostBound } from "../entities/RoundRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { gameTopic } from "../events.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** The host ends the game on purpose; it counts as a regular game over */
export class StopGame extends Command {
  readonly type = "StopGame" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly requestedBy: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { gameGateway, sessions, bus, logger, hostMonitor, timeoutWatcher } = ctx;

    const game = await gameGateway.loadGame(this.gameId);

    if (this.requestedBy !== game.host) {
      throw GameCommandInputError.because(["Only the host can stop the game"]);
    }

    if (!isHostBound(game.state)) {
      throw new InvalidGameStateError(game.id, game.state, "game has already ended");
    }

    await gameGateway.markGameState(game.id, "game_over");
    await sessions.terminate(game.id);
    timeoutWatcher?.unwatch(game.id);
    hostMonitor?.unmonitorGameHost(game.id);

    logger?.info?.("Game stopped by host", {
      type: this.type,
      gameId: game.id,
      at: this.at,
    });

    await bus.publish(gameTopic(game.id), {
      type: "GameStoppedByHost",
      gameId: game.id,
      at: this.at,
    });
  }
}
