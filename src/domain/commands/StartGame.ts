import { validateRoundDraft } from "../entities/RoundRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { gameTopic } from "../events.js";
import type { GameState } from "../ports/GameGateway.js";
import type { RoundDraft } from "../ports/RoundGateway.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { startNextRound } from "./RoundProgression.js";

export class StartGame extends Command {
  readonly type = "StartGame" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly requestedBy: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { gameGateway, roundGateway, wordCatalog, bus, logger, timeoutWatcher } = ctx;

    const game = await gameGateway.loadGame(this.gameId);
    await this.#assertCanStart(game, ctx);

    const drafts = await wordCatalog.drawRounds(game.config.roundsCount, game.config.gridSize);
    StartGame.#assertDrafts(drafts, game.config.roundsCount);

    // The lobby -> running transition is the only gate a concurrent start cannot pass.
    await gameGateway.startGame(game.id, this.at);
    await roundGateway.createRounds(game.id, drafts);
    timeoutWatcher?.watch(game.id);

    logger?.info?.("Game started", {
      type: this.type,
      gameId: game.id,
      rounds: drafts.length,
      at: this.at,
    });

    await bus.publish(gameTopic(game.id), {
      type: "GameStarted",
      gameId: game.id,
      roundsCount: drafts.length,
      at: this.at,
    });

    await startNextRound(game.id, this.at, ctx);
  }

  async #assertCanStart(game: GameState, { gameGateway }: CommandContext): Promise<void> {
    if (this.requestedBy !== game.host) {
      throw GameCommandInputError.because(["Only the host can start the game"]);
    }

    if (game.state !== "waiting_for_players") {
      throw new InvalidGameStateError(game.id, game.state, "game has already left its lobby");
    }

    const players = await gameGateway.listPlayers(game.id);
    if (players.length === 0) {
      throw GameCommandInputError.because(["At least one player must join before starting"]);
    }
  }

  static #assertDrafts(drafts: readonly RoundDraft[], expected: number): void {
    const issues = drafts.flatMap((draft) => [...validateRoundDraft(draft)]);

    if (drafts.length !== expected) {
      issues.unshift(`Word catalog returned ${drafts.length} rounds, expected ${expected}`);
    }

    if (issues.length > 0) {
      throw new Error(`Unusable round content: ${issues.join("; ")}`);
    }
  }
}
