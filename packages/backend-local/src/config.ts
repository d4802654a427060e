import * as dotenv from "dotenv";
import { z } from "zod";

import { createSessionConfig, type SessionConfig } from "./core.js";
import { describeIssues } from "./schemas.js";

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  PORT: positiveInt.default(8787),
  HINTLINE_TICK_INTERVAL_MS: positiveInt.optional(),
  HINTLINE_HOST_DISCONNECT_DEBOUNCE_MS: z.coerce.number().int().nonnegative().optional(),
  HINTLINE_FEEDBACK_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  HINTLINE_LOBBY_TIMEOUT_MS: positiveInt.optional(),
  HINTLINE_LOBBY_SWEEP_INTERVAL_MS: positiveInt.optional(),
  HINTLINE_WORDS_FILE: z.string().min(1).optional(),
  HINTLINE_WORD_SEED: z.coerce.number().int().optional(),
});

export interface ServerConfig {
  readonly port: number;
  readonly session: SessionConfig;
  /** Word list to load instead of the bundled one */
  readonly wordsFile: string | undefined;
  /** Fixed seed for word draws; random when absent */
  readonly wordSeed: number | undefined;
}

export function loadServerConfig(
  env: Readonly<Record<string, string | undefined>>,
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${describeIssues(parsed.error).join("; ")}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    session: createSessionConfig({
      tickIntervalMs: values.HINTLINE_TICK_INTERVAL_MS,
      hostDisconnectDebounceMs: values.HINTLINE_HOST_DISCONNECT_DEBOUNCE_MS,
      feedbackDelayMs: values.HINTLINE_FEEDBACK_DELAY_MS,
      lobbyTimeoutMs: values.HINTLINE_LOBBY_TIMEOUT_MS,
      lobbySweepIntervalMs: values.HINTLINE_LOBBY_SWEEP_INTERVAL_MS,
    }),
    wordsFile: values.HINTLINE_WORDS_FILE,
    wordSeed: values.HINTLINE_WORD_SEED,
  };
}

/** Read `.env` into `process.env`, then validate it */
export function loadServerConfigFromEnv(): ServerConfig {
  dotenv.config();
  return loadServerConfig(process.env);
}
