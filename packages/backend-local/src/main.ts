import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { loadServerConfigFromEnv } from "./config.js";
import { ConnectionRegistry } from "./connections.js";
import { dispatchCommand } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { createRuntime } from "./runtime.js";
import { ConnectQuerySchema } from "./schemas.js";
import { loadWordCatalog } from "./words.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("hintline");
  const config = loadServerConfigFromEnv();

  const scheduler = new RealScheduler({ logger });
  const bus = new WebSocketBus(logger);
  const wordCatalog = await loadWordCatalog(config.wordsFile, config.wordSeed);
  logger.info("Word catalog loaded", { words: wordCatalog.size });

  const runtime = createRuntime({
    bus,
    scheduler,
    wordCatalog,
    config: config.session,
    logger,
  });
  const createContext = () => runtime.context;

  const app = createBackendApp({
    port: config.port,
    logger,
    createContext,
    dispatch: dispatchCommand,
  });

  const connections = new ConnectionRegistry({
    sockets: bus,
    presence: runtime.presence,
    createContext,
    dispatch: dispatchCommand,
    logger,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/games/:gameId",
    upgradeWebSocket((c) => {
      const gameId = c.req.param("gameId") ?? "";
      const query = ConnectQuerySchema.safeParse(c.req.query());
      let opened: Promise<string> | undefined;

      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { gameId });
            return;
          }
          if (!query.success || gameId.length === 0) {
            ws.close(1008, "role and identity are required");
            return;
          }

          opened = connections.open(gameId, query.data, rawSocket);
          opened.catch((error: unknown) => {
            logger.error("Failed to open connection", { gameId, error });
          });
        },
        onClose(): void {
          opened
            ?.then((key) => connections.close(key))
            .catch((error: unknown) => {
              logger.error("Failed to close connection", { gameId, error });
            });
        },
      };
    }),
  );

  runtime.sweeper.start();

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info("Shutting down", { signal });
    await runtime.shutdown();
    scheduler.cancelAll();
    server.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exitCode = 1;
      });
    });
  }
}

startServer().catch((error: unknown) => {
  createConsoleLogger("hintline").error("Failed to start backend", { error });
  process.exit(1);
});
