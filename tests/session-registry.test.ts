import { describe, expect, it, vi } from "vitest";

import { InMemoryMessageBus } from "../src/adapters/in-memory/InMemoryMessageBus.js";
import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import type { RoundState } from "../src/domain/ports/RoundGateway.js";
import { SessionRegistry } from "../src/domain/session/SessionRegistry.js";
import type { RoundId } from "../src/domain/typedefs.js";
import { createLoggerMock, makeRound } from "./support/mocks.js";

function createRegistry() {
  const scheduler = new InMemoryScheduler();
  const bus = new InMemoryMessageBus({ record: true });
  const logger = createLoggerMock();
  const roundGateway = {
    loadRound: vi.fn(async (roundId: RoundId): Promise<RoundState> =>
      makeRound({ id: roundId, keywordIds: ["k1", "k2", "k3"] }),
    ),
  };
  const registry = new SessionRegistry({
    roundGateway,
    bus,
    scheduler,
    config: { tickIntervalMs: 1_000 },
    logger,
  });
  return { registry, scheduler, bus, logger };
}

describe("SessionRegistry", () => {
  it("reports games without a session as not running", async () => {
    const { registry } = createRegistry();

    await expect(registry.getState("game-9")).resolves.toEqual({
      status: "not_running",
      gameId: "game-9",
    });
    expect(registry.size).toBe(0);
  });

  it("creates a session when a round timer starts", async () => {
    const { registry, scheduler, logger } = createRegistry();

    await registry.startRoundTimer("game-1", "round-1", 3);
    await scheduler.runFor(2_000);

    expect(registry.size).toBe(1);
    expect(registry.lookup("game-1")).toBeDefined();
    await expect(registry.getState("game-1")).resolves.toMatchObject({
      status: "running",
      state: { gameId: "game-1", roundId: "round-1", elapsedSeconds: 2, keywordsTotal: 3 },
    });
    expect(logger.info).toHaveBeenCalledWith("Session created", { gameId: "game-1", sessions: 1 });
  });

  it("reuses the session of a game for the next round", async () => {
    const { registry } = createRegistry();

    await registry.startRoundTimer("game-1", "round-1", 3);
    const first = registry.lookup("game-1");
    await registry.startRoundTimer("game-1", "round-2", 3);

    expect(registry.lookup("game-1")).toBe(first);
    expect(registry.size).toBe(1);
  });

  it("keeps games apart", async () => {
    const { registry, scheduler } = createRegistry();

    await registry.startRoundTimer("game-1", "round-1", 3);
    await scheduler.runFor(2_000);
    await registry.startRoundTimer("game-2", "round-7", 3);
    await scheduler.runFor(1_000);

    await expect(registry.getState("game-1")).resolves.toMatchObject({
      state: { elapsedSeconds: 3 },
    });
    await expect(registry.getState("game-2")).resolves.toMatchObject({
      state: { roundId: "round-7", elapsedSeconds: 1 },
    });
  });

  it("treats stop and pause on an unknown game as no-ops", async () => {
    const { registry } = createRegistry();

    await registry.stopRoundTimer("game-1");
    await registry.pauseTimer("game-1");

    expect(registry.size).toBe(0);
  });

  it("terminates and forgets a session", async () => {
    const { registry, scheduler, bus } = createRegistry();

    await registry.startRoundTimer("game-1", "round-1", 3);
    const session = registry.lookup("game-1");

    await expect(registry.terminate("game-1")).resolves.toBe(true);
    const publishedAtTerminate = bus.published.length;
    await scheduler.runFor(5_000);

    expect(session?.terminated).toBe(true);
    expect(registry.size).toBe(0);
    expect(bus.published.length).toBe(publishedAtTerminate);
    await expect(registry.terminate("game-1")).resolves.toBe(false);
    await expect(registry.getState("game-1")).resolves.toMatchObject({ status: "not_running" });
  });

  it("terminates every session on shutdown", async () => {
    const { registry } = createRegistry();

    await registry.startRoundTimer("game-1", "round-1", 3);
    await registry.startRoundTimer("game-2", "round-2", 3);
    await registry.terminateAll();

    expect(registry.size).toBe(0);
  });
});
