import { describe, expect, it, vi } from "vitest";

import { InMemoryMessageBus } from "../src/adapters/in-memory/InMemoryMessageBus.js";
import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import { RoundNotFoundError } from "../src/domain/errors/RoundNotFoundError.js";
import { gameTopic } from "../src/domain/events.js";
import type { RoundState } from "../src/domain/ports/RoundGateway.js";
import type { Scheduler } from "../src/domain/ports/Scheduler.js";
import { GameSession } from "../src/domain/session/GameSession.js";
import type { RoundId } from "../src/domain/typedefs.js";
import { eventsOfType, makeRound } from "./support/mocks.js";

const TOPIC = gameTopic("game-1");

function createHarness(options: { readonly scheduler?: Scheduler } = {}) {
  const clock = new InMemoryScheduler();
  const scheduler = options.scheduler ?? clock;
  const bus = new InMemoryMessageBus({ record: true });
  const rounds = new Map<RoundId, RoundState>([
    ["round-a", makeRound({ id: "round-a", keywordIds: ["k1", "k2"] })],
    ["round-b", makeRound({ id: "round-b", position: 2, keywordIds: ["k3", "k4"] })],
  ]);
  const roundGateway = {
    loadRound: vi.fn(async (roundId: RoundId): Promise<RoundState> => {
      const round = rounds.get(roundId);
      if (!round) {
        throw new RoundNotFoundError(roundId);
      }
      return round;
    }),
  };

  const session = new GameSession({
    gameId: "game-1",
    roundGateway,
    bus,
    scheduler,
    tickIntervalMs: 1_000,
  });

  const reveals = () =>
    eventsOfType(bus.eventsOn(TOPIC), "KeywordRevealed").map(
      ({ roundId, revealCount, elapsedSeconds }) => ({ roundId, revealCount, elapsedSeconds }),
    );
  const timeouts = () => eventsOfType(bus.eventsOn(TOPIC), "RoundTimeout");

  return { clock, bus, session, roundGateway, reveals, timeouts };
}

/** Cancelling does nothing, so stale messages still reach the session */
function leakyScheduler(inner: InMemoryScheduler): Scheduler {
  return {
    now: () => inner.now(),
    schedule: (delayMs, task) => {
      inner.schedule(delayMs, task);
      return { cancel: () => undefined };
    },
  };
}

describe("GameSession", () => {
  it("reveals the first keyword immediately and the second on the interval", async () => {
    const { clock, session, reveals, timeouts } = createHarness();

    await session.startRoundTimer("round-a", 3);
    expect(reveals()).toEqual([{ roundId: "round-a", revealCount: 1, elapsedSeconds: 0 }]);

    await clock.runFor(6_000);

    expect(reveals().map(({ revealCount, elapsedSeconds }) => [elapsedSeconds, revealCount]))
      .toEqual([
        [0, 1],
        [1, 1],
        [2, 1],
        [3, 2],
        [4, 2],
        [5, 2],
        [6, 2],
      ]);
    expect(timeouts()).toEqual([{ type: "RoundTimeout", gameId: "game-1", roundId: "round-a" }]);
  });

  it("fires the round timeout once however long the timer keeps ticking", async () => {
    const { clock, session, timeouts } = createHarness();

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(30_000);

    expect(timeouts()).toHaveLength(1);
    const state = await session.getState();
    expect(state).toMatchObject({
      roundId: "round-a",
      elapsedSeconds: 30,
      keywordsRevealed: 2,
      keywordsTotal: 2,
      timeoutScheduled: true,
    });
  });

  it("never reveals more keywords than the round has and never goes back", async () => {
    const { clock, session, reveals } = createHarness();

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(20_000);

    const counts = reveals().map(({ revealCount }) => revealCount);
    expect(Math.max(...counts)).toBe(2);
    counts.forEach((count, index) => {
      expect(count).toBeGreaterThanOrEqual(counts[index - 1] ?? 0);
    });
    const firstFull = reveals().find(({ revealCount }) => revealCount === 2);
    expect(firstFull?.elapsedSeconds).toBe(3);
  });

  it("ignores ticks of the previous round after a fast round switch", async () => {
    const clock = new InMemoryScheduler();
    const { bus, session } = createHarness({ scheduler: leakyScheduler(clock) });

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(500);
    await session.startRoundTimer("round-b", 3);
    const switchedAt = bus.published.length;

    await clock.runFor(10_000);

    const after = bus.published.slice(switchedAt).map(({ event }) => event);
    expect(after.length).toBeGreaterThan(0);
    for (const event of after) {
      expect(event).toMatchObject({ roundId: "round-b" });
    }
    await expect(session.getState()).resolves.toMatchObject({
      roundId: "round-b",
      elapsedSeconds: 10,
    });
  });

  it("emits nothing for the stopped round after the next one starts", async () => {
    const { clock, bus, session } = createHarness();

    await session.startRoundTimer("round-a", 5);
    await clock.runFor(2_000);
    await session.stopRoundTimer();
    await session.startRoundTimer("round-b", 5);
    const restartedAt = bus.published.length;

    await clock.runFor(30_000);

    const after = bus.published.slice(restartedAt).map(({ event }) => event);
    expect(after.some((event) => "roundId" in event && event.roundId === "round-a")).toBe(false);
    expect(eventsOfType(after, "RoundTimeout")).toEqual([
      { type: "RoundTimeout", gameId: "game-1", roundId: "round-b" },
    ]);
  });

  it("resets to idle on stop and ignores the old round's timers", async () => {
    const clock = new InMemoryScheduler();
    const { bus, session } = createHarness({ scheduler: leakyScheduler(clock) });

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(2_000);
    await session.stopRoundTimer();
    const stoppedAt = bus.published.length;

    await clock.runFor(10_000);

    expect(bus.published.length).toBe(stoppedAt);
    await expect(session.getState()).resolves.toMatchObject({
      status: "idle",
      elapsedSeconds: 0,
      keywordsRevealed: 0,
      timeoutScheduled: false,
    });
  });

  it("keeps counters frozen across repeated pauses", async () => {
    const { clock, session } = createHarness();

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(2_000);

    await session.pauseTimer();
    const first = await session.getState();
    await session.pauseTimer();
    const second = await session.getState();
    await clock.runFor(5_000);
    const later = await session.getState();

    expect(second).toEqual(first);
    expect(later).toEqual(first);
    expect(first).toMatchObject({ elapsedSeconds: 2, keywordsRevealed: 1, paused: true });
  });

  it("resumes a paused round where it stopped without announcing the first keyword again", async () => {
    const { clock, session, reveals } = createHarness();

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(2_000);
    await session.pauseTimer();
    const before = reveals().length;

    await session.startRoundTimer("round-a", 3);
    expect(reveals()).toHaveLength(before);

    await clock.runFor(1_000);
    expect(reveals().slice(before)).toEqual([
      { roundId: "round-a", revealCount: 2, elapsedSeconds: 3 },
    ]);
  });

  it("still delivers a timeout that was already due when the timer pauses", async () => {
    const { clock, session, timeouts } = createHarness();

    await session.startRoundTimer("round-a", 3);
    await clock.runFor(5_000);
    // the tick at 6s schedules the timeout; pause lands before it runs
    const pending = clock.runFor(1_000);
    await session.pauseTimer();
    await pending;

    expect(timeouts()).toHaveLength(1);
  });

  it("rejects a clue interval that is not a positive integer", async () => {
    const { session, roundGateway } = createHarness();

    await expect(session.startRoundTimer("round-a", 0)).rejects.toThrow(
      "Clue interval must be a positive integer",
    );
    await expect(session.startRoundTimer("round-a", 1.5)).rejects.toThrow(
      "Clue interval must be a positive integer",
    );
    expect(roundGateway.loadRound).not.toHaveBeenCalled();
  });

  it("surfaces an unknown round to the caller and keeps serving messages", async () => {
    const { session } = createHarness();

    await expect(session.startRoundTimer("round-x", 3)).rejects.toBeInstanceOf(
      RoundNotFoundError,
    );
    await session.startRoundTimer("round-a", 3);
    await expect(session.getState()).resolves.toMatchObject({
      roundId: "round-a",
      status: "playing",
    });
  });

  it("drops every message after terminate", async () => {
    const { clock, bus, session } = createHarness();

    await session.startRoundTimer("round-a", 3);
    await session.terminate();
    const terminatedAt = bus.published.length;

    await session.startRoundTimer("round-b", 3);
    await clock.runFor(10_000);

    expect(session.terminated).toBe(true);
    expect(bus.published.length).toBe(terminatedAt);
    await expect(session.getState()).resolves.toMatchObject({ status: "idle" });
  });
});
