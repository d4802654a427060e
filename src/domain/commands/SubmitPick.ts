import { calculatePoints, isCorrectPick } from "../entities/RoundRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { InvalidRoundStateError } from "../errors/InvalidRoundStateError.js";
import { gameTopic } from "../events.js";
import type { PickState } from "../ports/RoundGateway.js";
import type { PlayerId, RoundId, TimePoint, WordId } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { dispatchCommand } from "./dispatchCommand.js";
import { FinishRound } from "./FinishRound.js";

/**
 * Record a player's guess. Timing and the number of visible keywords come from
 * the game's session, not from the client. When this is the last missing
 * pick, the timer freezes and the round finishes after the feedback delay.
 */
export class SubmitPick extends Command<PickState> {
  readonly type = "SubmitPick" as const;

  constructor(
    public readonly roundId: RoundId,
    public readonly playerId: PlayerId,
    public readonly wordId: WordId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<PickState> {
    const { roundGateway, gameGateway, sessions, scheduler, bus, logger, config } = ctx;

    const round = await roundGateway.loadRound(this.roundId);
    if (round.state !== "playing") {
      throw new InvalidRoundStateError(round.id, round.state, "picks are only accepted while playing");
    }

    const game = await gameGateway.loadGame(round.gameId);
    if (game.state !== "game_running") {
      throw new InvalidGameStateError(game.id, game.state, "game is not running");
    }

    const players = await gameGateway.listPlayers(game.id);
    if (!players.some((player) => player.id === this.playerId)) {
      throw GameCommandInputError.because(["Player is not part of this game"]);
    }

    if (!round.possibleWordIds.includes(this.wordId)) {
      throw GameCommandInputError.because(["Word is not part of this round's grid"]);
    }

    const session = await sessions.getState(game.id);
    if (session.status !== "running" || session.state.roundId !== round.id) {
      throw new InvalidRoundStateError(round.id, round.state, "round timer is not running");
    }

    const keywordsShown = session.state.keywordsRevealed;
    const isCorrect = isCorrectPick(round, this.wordId);

    const { pick, allPicked } = await roundGateway.createPick(round.id, this.playerId, {
      wordId: this.wordId,
      time: session.state.elapsedSeconds,
      keywordsShown,
      isCorrect,
      pickedAt: this.at,
    });

    if (isCorrect) {
      await gameGateway.addPoints(
        game.id,
        this.playerId,
        calculatePoints(keywordsShown, round.keywordIds.length),
      );
    }

    logger?.info?.("Pick recorded", {
      type: this.type,
      gameId: game.id,
      roundId: round.id,
      playerId: this.playerId,
      isCorrect,
      allPicked,
      at: this.at,
    });

    await bus.publish(gameTopic(game.id), {
      type: "PickRecorded",
      gameId: game.id,
      roundId: round.id,
      playerId: this.playerId,
      at: this.at,
    });

    if (allPicked) {
      await sessions.pauseTimer(game.id);

      await bus.publish(gameTopic(game.id), {
        type: "AllPlayersPicked",
        gameId: game.id,
        roundId: round.id,
        at: this.at,
      });

      scheduler.schedule(config.feedbackDelayMs, () =>
        dispatchCommand(new FinishRound(round.id, "all_picked", scheduler.now()), ctx),
      );
    }

    return pick;
  }
}
