/* eslint-disable no-console */
import type { Logger } from "./core.js";

/**
 * Console logger whose lines start with an ISO timestamp and `[namespace]`.
 * Debug lines are printed only when `DEBUG` is set.
 */
export function createConsoleLogger(namespace: string): Required<Logger> {
  const prefix = (): string => `${new Date().toISOString()} [${namespace}]`;
  return {
    info(message: string, meta?: unknown): void {
      console.info(prefix(), message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      console.warn(prefix(), message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix(), message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (process.env["DEBUG"]) {
        console.debug(prefix(), message, meta ?? "");
      }
    },
  } satisfies Logger;
}
