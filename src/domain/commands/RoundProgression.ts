import { gameTopic } from "../events.js";
import type { GameState } from "../ports/GameGateway.js";
import type { GameId, RoundId, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

/**
 * Activate the game's next `on_hold` round and start its timer, or end the
 * game when none is left. A game that stopped running in the meantime (host
 * gone, stopped by the host) is left alone.
 */
export async function startNextRound(
  gameId: GameId,
  at: TimePoint,
  ctx: CommandContext,
): Promise<void> {
  const { gameGateway, roundGateway, sessions, bus, logger } = ctx;

  const game = await gameGateway.loadGame(gameId);
  if (game.state !== "game_running") {
    logger?.info?.("Round advancement skipped; game not running", {
      gameId,
      state: game.state,
      at,
    });
    return;
  }

  const round = await roundGateway.activateNextRound(gameId);

  const current = await gameGateway.loadGame(gameId);
  if (current.state !== "game_running") {
    await abandonRound(gameId, round?.id, current, at, ctx);
    return;
  }

  if (!round) {
    await endGame(current, at, ctx);
    return;
  }

  logger?.info?.("Round started", {
    gameId,
    roundId: round.id,
    position: round.position,
    at,
  });

  await bus.publish(gameTopic(gameId), {
    type: "RoundStarted",
    gameId,
    roundId: round.id,
    position: round.position,
    possibleWordIds: [...round.possibleWordIds],
    keywordsTotal: round.keywordIds.length,
    cluesIntervalSeconds: current.config.cluesIntervalSeconds,
    at,
  });

  await sessions.startRoundTimer(gameId, round.id, current.config.cluesIntervalSeconds);

  // Teardown marks the game before terminating its session, so a game that
  // ended while the timer was starting is caught either there or here.
  const afterStart = await gameGateway.loadGame(gameId);
  if (afterStart.state !== "game_running") {
    await sessions.terminate(gameId);
    await abandonRound(gameId, round.id, afterStart, at, ctx);
  }
}

async function abandonRound(
  gameId: GameId,
  roundId: RoundId | undefined,
  game: GameState,
  at: TimePoint,
  { roundGateway, logger }: CommandContext,
): Promise<void> {
  if (roundId !== undefined) {
    await roundGateway.finishRound(roundId);
  }
  logger?.info?.("Round advancement abandoned; game ended meanwhile", {
    gameId,
    roundId,
    state: game.state,
    at,
  });
}

export async function endGame(
  game: GameState,
  at: TimePoint,
  ctx: CommandContext,
): Promise<void> {
  const { gameGateway, sessions, bus, logger, hostMonitor, timeoutWatcher } = ctx;

  await gameGateway.markGameState(game.id, "game_over");
  await sessions.terminate(game.id);
  timeoutWatcher?.unwatch(game.id);
  hostMonitor?.unmonitorGameHost(game.id);

  const leaderboard = await gameGateway.leaderboard(game.id);

  logger?.info?.("Game over", { gameId: game.id, at });

  await bus.publish(gameTopic(game.id), {
    type: "GameOver",
    gameId: game.id,
    leaderboard: [...leaderboard],
    at,
  });
}
