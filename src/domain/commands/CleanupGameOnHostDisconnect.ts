import { isHostBound } from "../entities/RoundRules.js";
import { gameTopic } from "../events.js";
import type { GameId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/**
 * Tear down a game whose host is gone for good. Running it again, or on a game
 * that already ended or no longer exists, changes nothing.
 */
export class CleanupGameOnHostDisconnect extends Command {
  readonly type = "CleanupGameOnHostDisconnect" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { gameGateway, sessions, bus, logger, timeoutWatcher } = ctx;

    const game = await gameGateway.findGame(this.gameId);
    if (!game || !isHostBound(game.state)) {
      logger?.debug?.("Host cleanup skipped; game already ended", {
        type: this.type,
        gameId: this.gameId,
        state: game?.state,
      });
      return;
    }

    await gameGateway.markGameState(game.id, "host_disconnected");
    await sessions.terminate(game.id);
    timeoutWatcher?.unwatch(game.id);

    logger?.info?.("Game cleaned up after host disconnect", {
      type: this.type,
      gameId: game.id,
      previousState: game.state,
      at: this.at,
    });

    await bus.publish(gameTopic(game.id), {
      type: "HostDisconnected",
      gameId: game.id,
      at: this.at,
    });
  }
}
