import { gameTopic } from "../events.js";
import type { GameId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Close every lobby that has waited longer than the lobby timeout */
export class TimeoutLobbies extends Command<readonly GameId[]> {
  readonly type = "TimeoutLobbies" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({
    gameGateway,
    bus,
    logger,
    config,
    hostMonitor,
  }: CommandContext): Promise<readonly GameId[]> {
    const threshold = this.at - config.lobbyTimeoutMs;
    const lobbies = await gameGateway.listGamesInState("waiting_for_players");
    const expired = lobbies.filter((game) => game.createdAt <= threshold);

    for (const game of expired) {
      await gameGateway.markGameState(game.id, "lobby_timeout");
      hostMonitor?.unmonitorGameHost(game.id);

      logger?.info?.("Lobby timed out", { type: this.type, gameId: game.id, at: this.at });

      await bus.publish(gameTopic(game.id), {
        type: "LobbyTimedOut",
        gameId: game.id,
        at: this.at,
      });
    }

    if (expired.length > 0) {
      logger?.info?.("Timed out lobbies", { type: this.type, count: expired.length });
    }

    return expired.map((game) => game.id);
  }
}
