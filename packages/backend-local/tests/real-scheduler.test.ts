import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RealScheduler } from "../src/adapters/RealScheduler.js";
import { createLoggerMock } from "./support/testContext.js";

describe("RealScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it("runs a task once its delay has elapsed", async () => {
    const scheduler = new RealScheduler();
    const task = vi.fn();

    scheduler.schedule(5_000, task);
    expect(scheduler.pending).toBe(1);

    await vi.advanceTimersByTimeAsync(4_999);
    expect(task).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.pending).toBe(0);
  });

  it("drops cancelled tasks", async () => {
    const scheduler = new RealScheduler();
    const task = vi.fn();

    scheduler.schedule(1_000, task).cancel();
    await vi.runAllTimersAsync();

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.pending).toBe(0);
  });

  it("logs failing tasks instead of rethrowing", async () => {
    const logger = createLoggerMock();
    const scheduler = new RealScheduler({ logger });
    const failure = new Error("boom");

    scheduler.schedule(10, async () => {
      throw failure;
    });
    await vi.runAllTimersAsync();

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith("Scheduled task failed", {
        delayMs: 10,
        error: failure,
      });
    });
  });

  it("reads time from the injected clock", () => {
    const scheduler = new RealScheduler({ clock: () => 42 });

    expect(scheduler.now()).toBe(42);
  });

  it("cancels everything on shutdown", async () => {
    const scheduler = new RealScheduler();
    const task = vi.fn();

    scheduler.schedule(100, task);
    scheduler.schedule(200, task);
    scheduler.cancelAll();
    await vi.runAllTimersAsync();

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.pending).toBe(0);
  });

  it("rejects negative delays", () => {
    const scheduler = new RealScheduler();

    expect(() => scheduler.schedule(-5, vi.fn())).toThrow("Delay must be non-negative");
  });
});
