import { describe, expect, it } from "vitest";

import { CreateGame } from "../src/domain/commands/CreateGame.js";
import { GameCommandInputError } from "../src/domain/errors/GameCommandInputError.js";
import { createGameConfig } from "../src/domain/GameConfig.js";
import { createCommandContext, makeGame } from "./support/mocks.js";

describe("CreateGame command", () => {
  it("creates the lobby, starts host monitoring and announces the game", async () => {
    const context = createCommandContext();
    const { gameGateway, hostMonitor, bus } = context;
    const config = createGameConfig({ roundsCount: 2, cluesIntervalSeconds: 3, gridSize: 4 });
    const game = makeGame({ config, createdAt: 100 });
    gameGateway.createGame.mockResolvedValue(game);

    const result = await new CreateGame("hana", config, 100).execute(context);

    expect(result).toEqual(game);
    expect(gameGateway.createGame).toHaveBeenCalledWith("hana", config, 100);
    expect(hostMonitor.monitorGameHost).toHaveBeenCalledWith("game-1");
    expect(bus.publish).toHaveBeenCalledWith("game:game-1", {
      type: "GameCreated",
      gameId: "game-1",
      host: "hana",
      config,
      at: 100,
    });
  });

  it("rejects an invalid host and configuration before touching the store", () => {
    let caught: unknown;
    try {
      new CreateGame(" ", createGameConfig({ gridSize: 5 }), 0);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GameCommandInputError);
    expect(caught).toMatchObject({
      issues: [
        "Host must be a non-empty string without whitespace",
        "gridSize must be one of 2, 4, 9, 16",
      ],
    });
  });
});
