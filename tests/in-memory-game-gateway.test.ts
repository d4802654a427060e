import { describe, expect, it } from "vitest";

import { InMemoryGameGateway } from "../src/adapters/in-memory/InMemoryGameGateway.js";
import { GameNotFoundError } from "../src/domain/errors/GameNotFoundError.js";
import { InvalidGameStateError } from "../src/domain/errors/InvalidGameStateError.js";
import { createGameConfig } from "../src/domain/GameConfig.js";

const config = createGameConfig({ roundsCount: 2, cluesIntervalSeconds: 3, gridSize: 4 });

describe("InMemoryGameGateway", () => {
  it("creates lobbies with sequential ids", async () => {
    const gateway = new InMemoryGameGateway();

    const first = await gateway.createGame("hana", config, 100);
    const second = await gateway.createGame("ravi", config, 200);

    expect(first).toEqual({
      id: "game-1",
      host: "hana",
      config,
      state: "waiting_for_players",
      createdAt: 100,
    });
    expect(second.id).toBe("game-2");
  });

  it("returns copies that do not write through", async () => {
    const gateway = new InMemoryGameGateway();
    const game = await gateway.createGame("hana", config, 0);

    game.state = "game_over";

    await expect(gateway.loadGame(game.id)).resolves.toMatchObject({
      state: "waiting_for_players",
    });
  });

  it("fails to load unknown games but finds nothing quietly", async () => {
    const gateway = new InMemoryGameGateway();

    await expect(gateway.loadGame("game-404")).rejects.toBeInstanceOf(GameNotFoundError);
    await expect(gateway.findGame("game-404")).resolves.toBeUndefined();
    await expect(gateway.markGameState("game-404", "game_over")).rejects.toBeInstanceOf(
      GameNotFoundError,
    );
  });

  it("starts a lobby once", async () => {
    const gateway = new InMemoryGameGateway();
    const game = await gateway.createGame("hana", config, 0);

    await expect(gateway.startGame(game.id, 500)).resolves.toMatchObject({
      state: "game_running",
      startedAt: 500,
    });
    await expect(gateway.startGame(game.id, 600)).rejects.toBeInstanceOf(
      InvalidGameStateError,
    );
  });

  it("lists games by state", async () => {
    const gateway = new InMemoryGameGateway();
    const lobby = await gateway.createGame("hana", config, 0);
    const ended = await gateway.createGame("ravi", config, 0);
    await gateway.markGameState(ended.id, "game_over");

    const lobbies = await gateway.listGamesInState("waiting_for_players");

    expect(lobbies.map((game) => game.id)).toEqual([lobby.id]);
  });

  it("adds each player once, in join order", async () => {
    const gateway = new InMemoryGameGateway();
    const game = await gateway.createGame("hana", config, 0);

    const first = await gateway.addPlayer(game.id, "ana", 10);
    const second = await gateway.addPlayer(game.id, "bo", 20);
    const again = await gateway.addPlayer(game.id, "ana", 30);

    expect(first.inserted).toBe(true);
    expect(second.players.map((player) => player.id)).toEqual(["ana", "bo"]);
    expect(again.inserted).toBe(false);
    await expect(gateway.listPlayers(game.id)).resolves.toEqual([
      { id: "ana", gameId: game.id, points: 0, joinedAt: 10 },
      { id: "bo", gameId: game.id, points: 0, joinedAt: 20 },
    ]);
  });

  it("removes players", async () => {
    const gateway = new InMemoryGameGateway();
    const game = await gateway.createGame("hana", config, 0);
    await gateway.addPlayer(game.id, "ana", 10);

    await expect(gateway.removePlayer(game.id, "ana")).resolves.toBe(true);
    await expect(gateway.removePlayer(game.id, "ana")).resolves.toBe(false);
    await expect(gateway.listPlayers(game.id)).resolves.toEqual([]);
  });

  it("orders the leaderboard by points, then by join time", async () => {
    const gateway = new InMemoryGameGateway();
    const game = await gateway.createGame("hana", config, 0);
    await gateway.addPlayer(game.id, "ana", 10);
    await gateway.addPlayer(game.id, "bo", 20);
    await gateway.addPlayer(game.id, "cy", 30);

    await gateway.addPoints(game.id, "bo", 3);
    await gateway.addPoints(game.id, "cy", 5);
    await gateway.addPoints(game.id, "ana", 2);
    await expect(gateway.addPoints(game.id, "ana", 1)).resolves.toMatchObject({ points: 3 });

    await expect(gateway.leaderboard(game.id)).resolves.toEqual([
      { playerId: "cy", points: 5 },
      { playerId: "ana", points: 3 },
      { playerId: "bo", points: 3 },
    ]);
  });

  it("deletes a game with its players", async () => {
    const gateway = new InMemoryGameGateway();
    const game = await gateway.createGame("hana", config, 0);
    await gateway.addPlayer(game.id, "ana", 10);

    await gateway.deleteGame(game.id);

    await expect(gateway.findGame(game.id)).resolves.toBeUndefined();
    await expect(gateway.listPlayers(game.id)).resolves.toEqual([]);
  });
});
