import { describe, expect, it } from "vitest";

import {
  createGameConfig,
  createSessionConfig,
  validateGameConfig,
} from "../../src/domain/GameConfig.js";

describe("createGameConfig", () => {
  it("fills in defaults", () => {
    expect(createGameConfig()).toEqual({
      roundsCount: 3,
      cluesIntervalSeconds: 15,
      gridSize: 9,
    });
  });

  it("keeps overrides", () => {
    expect(createGameConfig({ roundsCount: 5, gridSize: 16 })).toEqual({
      roundsCount: 5,
      cluesIntervalSeconds: 15,
      gridSize: 16,
    });
  });
});

describe("validateGameConfig", () => {
  it("accepts the defaults", () => {
    expect(validateGameConfig(createGameConfig())).toEqual([]);
  });

  it("reports every out-of-range setting", () => {
    expect(
      validateGameConfig({ roundsCount: 0, cluesIntervalSeconds: 7, gridSize: 5 }),
    ).toEqual([
      "roundsCount must be an integer between 1 and 20",
      "cluesIntervalSeconds must be one of 3, 6, 9, 12, 15, 20, 30, 45, 60",
      "gridSize must be one of 2, 4, 9, 16",
    ]);
  });

  it("rejects fractional and oversized round counts", () => {
    expect(validateGameConfig(createGameConfig({ roundsCount: 2.5 }))).toHaveLength(1);
    expect(validateGameConfig(createGameConfig({ roundsCount: 21 }))).toHaveLength(1);
  });
});

describe("createSessionConfig", () => {
  it("uses the default timing policy", () => {
    expect(createSessionConfig()).toEqual({
      tickIntervalMs: 1_000,
      hostDisconnectDebounceMs: 2_000,
      feedbackDelayMs: 3_000,
      lobbyTimeoutMs: 900_000,
      lobbySweepIntervalMs: 300_000,
    });
  });

  it("lets deployments tune the debounce window", () => {
    expect(createSessionConfig({ hostDisconnectDebounceMs: 500 }).hostDisconnectDebounceMs).toBe(
      500,
    );
  });
});
