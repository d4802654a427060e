import { gameTopic } from "../events.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/**
 * Drop a player whose connection went away while the game is still in its
 * lobby. Once the game runs, players stay on the board even when offline.
 */
export class LeaveLobby extends Command {
  readonly type = "LeaveLobby" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ gameGateway, bus, logger }: CommandContext): Promise<void> {
    const game = await gameGateway.findGame(this.gameId);
    if (!game || game.state !== "waiting_for_players") {
      return;
    }

    const removed = await gameGateway.removePlayer(this.gameId, this.playerId);
    if (!removed) {
      return;
    }

    const players = await gameGateway.listPlayers(this.gameId);

    logger?.info?.("Player left lobby", {
      type: this.type,
      gameId: this.gameId,
      playerId: this.playerId,
      at: this.at,
    });

    await bus.publish(gameTopic(this.gameId), {
      type: "PlayerLeft",
      gameId: this.gameId,
      playerId: this.playerId,
      players: players.map((player) => player.id),
      at: this.at,
    });
  }
}
