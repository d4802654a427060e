import { isValidIdentifier } from "../entities/Identifiers.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { gameTopic } from "../events.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class JoinGame extends Command {
  readonly type = "JoinGame" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();

    if (!isValidIdentifier(playerId)) {
      throw GameCommandInputError.because([
        "Player identifier must be a non-empty string without whitespace",
      ]);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { gameGateway, bus, logger, config } = ctx;

    const game = await gameGateway.loadGame(this.gameId);

    if (game.state !== "waiting_for_players") {
      throw new InvalidGameStateError(
        game.id,
        game.state,
        "cannot join a game that is no longer in its lobby",
      );
    }

    if (this.at - game.createdAt >= config.lobbyTimeoutMs) {
      throw new InvalidGameStateError(game.id, game.state, "the lobby has timed out");
    }

    if (this.playerId === game.host) {
      throw GameCommandInputError.because(["The host cannot join as a player"]);
    }

    const { inserted, players } = await gameGateway.addPlayer(
      this.gameId,
      this.playerId,
      this.at,
    );

    if (!inserted) {
      logger?.info?.("Join ignored; player already part of the game", {
        type: this.type,
        gameId: this.gameId,
        playerId: this.playerId,
        at: this.at,
      });
      return;
    }

    logger?.info?.("Player joined game", {
      type: this.type,
      gameId: this.gameId,
      playerId: this.playerId,
      at: this.at,
    });

    await bus.publish(gameTopic(this.gameId), {
      type: "PlayerJoined",
      gameId: this.gameId,
      playerId: this.playerId,
      players: players.map((player) => player.id),
      at: this.at,
    });
  }
}
