import { isValidIdentifier } from "../entities/Identifiers.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { gameTopic } from "../events.js";
import { validateGameConfig, type GameConfig } from "../GameConfig.js";
import type { GameState } from "../ports/GameGateway.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class CreateGame extends Command<GameState> {
  readonly type = "CreateGame" as const;

  constructor(
    public readonly host: PlayerId,
    public readonly config: GameConfig,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isValidIdentifier(host)) {
      issues.push("Host must be a non-empty string without whitespace");
    }
    issues.push(...validateGameConfig(config));

    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<GameState> {
    const { gameGateway, bus, logger, hostMonitor } = ctx;

    const game = await gameGateway.createGame(this.host, this.config, this.at);
    hostMonitor?.monitorGameHost(game.id);

    logger?.info?.("Game created", {
      type: this.type,
      gameId: game.id,
      host: this.host,
      at: this.at,
    });

    await bus.publish(gameTopic(game.id), {
      type: "GameCreated",
      gameId: game.id,
      host: this.host,
      config: this.config,
      at: this.at,
    });

    return game;
  }
}
