import { gameTopic, type RoundFinishReason } from "../events.js";
import type { RoundId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { startNextRound } from "./RoundProgression.js";

/**
 * Close a playing round and move the game forward. Both "everyone picked" and
 * "reveal timeline elapsed" land here, possibly both for the same round; only
 * the first one to arrive has any effect.
 */
export class FinishRound extends Command {
  readonly type = "FinishRound" as const;

  constructor(
    public readonly roundId: RoundId,
    public readonly reason: RoundFinishReason,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { roundGateway, bus, logger } = ctx;

    const round = await roundGateway.loadRound(this.roundId);
    if (round.state !== "playing") {
      logger?.info?.("Finish ignored; round is not playing", {
        type: this.type,
        roundId: round.id,
        state: round.state,
        reason: this.reason,
      });
      return;
    }

    const finished = await roundGateway.finishRound(round.id);
    if (!finished) {
      return;
    }

    const picks = await roundGateway.listPicks(round.id);

    logger?.info?.("Round finished", {
      type: this.type,
      gameId: round.gameId,
      roundId: round.id,
      reason: this.reason,
      picks: picks.length,
      at: this.at,
    });

    await bus.publish(gameTopic(round.gameId), {
      type: "RoundFinished",
      gameId: round.gameId,
      roundId: round.id,
      wordId: round.wordId,
      reason: this.reason,
      picks: picks.map(({ playerId, wordId, isCorrect, keywordsShown, time }) => ({
        playerId,
        wordId,
        isCorrect,
        keywordsShown,
        time,
      })),
      at: this.at,
    });

    await startNextRound(round.gameId, this.at, ctx);
  }
}
