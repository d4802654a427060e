import { describe, expect, it } from "vitest";

import { ConnectionRegistry } from "../src/connections.js";
import {
  CreateGame,
  JoinGame,
  createGameConfig,
  dispatchCommand,
  hostTopic,
} from "../src/core.js";
import { FakeSocket, createTestRuntime, type TestRuntime } from "./support/testContext.js";

async function setup(players: readonly string[] = []) {
  const runtime = createTestRuntime();
  const { context } = runtime;
  await dispatchCommand(
    new CreateGame("hana", createGameConfig({ cluesIntervalSeconds: 3, gridSize: 2 }), 0),
    context,
  );
  for (const player of players) {
    await dispatchCommand(new JoinGame("game-1", player, 0), context);
  }

  const connections = new ConnectionRegistry({
    sockets: runtime.bus,
    presence: runtime.presence,
    createContext: () => context,
    dispatch: dispatchCommand,
    logger: runtime.logger,
  });
  return { runtime, connections };
}

async function playerIds(runtime: TestRuntime): Promise<string[]> {
  const players = await runtime.context.gameGateway.listPlayers("game-1");
  return players.map((player) => player.id);
}

describe("ConnectionRegistry", () => {
  it("tracks the host's socket on the host topic", async () => {
    const { runtime, connections } = await setup();

    const key = await connections.open(
      "game-1",
      { role: "host", identity: "hana" },
      new FakeSocket(),
    );

    expect(key).toBe("conn-1");
    expect(await runtime.presence.list(hostTopic("game-1"))).toEqual({
      "conn-1": { identity: "hana" },
    });
    expect(runtime.bus.clientCount("game:game-1")).toBe(1);
  });

  it("forwards game events to open sockets", async () => {
    const { runtime, connections } = await setup();
    const socket = new FakeSocket();
    await connections.open("game-1", { role: "player", identity: "ana" }, socket);

    await dispatchCommand(new JoinGame("game-1", "ana", 10), runtime.context);

    expect(socket.messages()).toEqual([
      {
        topic: "game:game-1",
        event: {
          type: "PlayerJoined",
          gameId: "game-1",
          playerId: "ana",
          players: ["ana"],
          at: 10,
        },
      },
    ]);
  });

  it("cleans the game up once the host's last socket stays closed", async () => {
    const { runtime, connections } = await setup();
    const key = await connections.open(
      "game-1",
      { role: "host", identity: "hana" },
      new FakeSocket(),
    );

    await connections.close(key);
    expect(await runtime.presence.list(hostTopic("game-1"))).toEqual({});

    await runtime.scheduler.runFor(2_000);

    const game = await runtime.context.gameGateway.loadGame("game-1");
    expect(game.state).toBe("host_disconnected");
    expect(runtime.bus.clientCount("game:game-1")).toBe(0);
  });

  it("does not count an impostor as the host", async () => {
    const { runtime, connections } = await setup();

    await connections.open("game-1", { role: "host", identity: "mallory" }, new FakeSocket());

    expect(await runtime.presence.list(hostTopic("game-1"))).toEqual({});
    expect(runtime.logger.warn).toHaveBeenCalledWith("Host connection from a non-host identity", {
      gameId: "game-1",
      identity: "mallory",
      exists: true,
    });
  });

  it("removes a lobby player whose last socket closes", async () => {
    const { runtime, connections } = await setup(["ana", "bo"]);
    const first = await connections.open(
      "game-1",
      { role: "player", identity: "ana" },
      new FakeSocket(),
    );
    const second = await connections.open(
      "game-1",
      { role: "player", identity: "ana" },
      new FakeSocket(),
    );

    await connections.close(first);
    expect(await playerIds(runtime)).toEqual(["ana", "bo"]);

    await connections.close(second);
    expect(await playerIds(runtime)).toEqual(["bo"]);
    expect(connections.size).toBe(0);
  });

  it("ignores keys it does not know", async () => {
    const { connections } = await setup();

    await expect(connections.close("conn-99")).resolves.toBeUndefined();
  });
});
