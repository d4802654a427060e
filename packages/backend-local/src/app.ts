import { Hono } from "hono";
import type { Context, Next } from "hono";
import type { z } from "zod";

import {
  CancelGame,
  CreateGame,
  DuplicatePickError,
  GameCommandInputError,
  GameNotFoundError,
  InvalidGameStateError,
  InvalidRoundStateError,
  JoinGame,
  LeaveLobby,
  RoundNotFoundError,
  StartGame,
  StopGame,
  SubmitPick,
  createGameConfig,
  dispatchCommand,
  type Command,
  type CommandContext,
  type Logger,
} from "./core.js";
import {
  CreateGameBodySchema,
  PickBodySchema,
  PlayerBodySchema,
  describeIssues,
} from "./schemas.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch?: DispatchCommand;
}

type BodyResult<T> =
  | { readonly ok: true; readonly data: T }
  | { readonly ok: false; readonly issues: readonly string[] };

export function createBackendApp({
  port,
  logger,
  createContext,
  dispatch = dispatchCommand,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.onError((error, c) => {
    if (error instanceof GameCommandInputError) {
      return c.json({ error: error.message, issues: error.issues }, 400);
    }
    if (error instanceof GameNotFoundError || error instanceof RoundNotFoundError) {
      return c.json({ error: error.message }, 404);
    }
    if (
      error instanceof InvalidGameStateError ||
      error instanceof InvalidRoundStateError ||
      error instanceof DuplicatePickError
    ) {
      return c.json({ error: error.message }, 409);
    }

    logger.error?.("Unhandled request error", {
      method: c.req.method,
      path: c.req.path,
      error,
    });
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.post("/api/games", async (c) => {
    const body = await readBody(c, CreateGameBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }

    const { host, ...overrides } = body.data;
    const context = createContext();
    const game = await dispatch(
      new CreateGame(host, createGameConfig(overrides), context.scheduler.now()),
      context,
    );
    return c.json(game, 201);
  });

  app.get("/api/games/:gameId", async (c) => {
    const gameId = c.req.param("gameId");
    const { gameGateway } = createContext();
    const game = await gameGateway.loadGame(gameId);
    const players = await gameGateway.listPlayers(gameId);
    return c.json({ game, players });
  });

  app.post("/api/games/:gameId/join", async (c) => {
    const body = await readBody(c, PlayerBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }
    const context = createContext();
    await dispatch(
      new JoinGame(c.req.param("gameId"), body.data.playerId, context.scheduler.now()),
      context,
    );
    return c.json({ ok: true });
  });

  app.post("/api/games/:gameId/leave", async (c) => {
    const body = await readBody(c, PlayerBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }
    const context = createContext();
    await dispatch(
      new LeaveLobby(c.req.param("gameId"), body.data.playerId, context.scheduler.now()),
      context,
    );
    return c.json({ ok: true });
  });

  app.post("/api/games/:gameId/start", async (c) => {
    const body = await readBody(c, PlayerBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }
    const context = createContext();
    await dispatch(
      new StartGame(c.req.param("gameId"), body.data.playerId, context.scheduler.now()),
      context,
    );
    return c.json({ ok: true });
  });

  app.post("/api/games/:gameId/stop", async (c) => {
    const body = await readBody(c, PlayerBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }
    const context = createContext();
    await dispatch(
      new StopGame(c.req.param("gameId"), body.data.playerId, context.scheduler.now()),
      context,
    );
    return c.json({ ok: true });
  });

  app.post("/api/games/:gameId/cancel", async (c) => {
    const body = await readBody(c, PlayerBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }
    const context = createContext();
    await dispatch(
      new CancelGame(c.req.param("gameId"), body.data.playerId, context.scheduler.now()),
      context,
    );
    return c.json({ ok: true });
  });

  app.get("/api/games/:gameId/leaderboard", async (c) => {
    const gameId = c.req.param("gameId");
    const { gameGateway } = createContext();
    await gameGateway.loadGame(gameId);
    const leaderboard = await gameGateway.leaderboard(gameId);
    return c.json({ gameId, leaderboard });
  });

  app.get("/api/games/:gameId/session", async (c) => {
    const { sessions } = createContext();
    return c.json(await sessions.getState(c.req.param("gameId")));
  });

  // The target word stays hidden; only the keywords revealed so far are sent.
  app.get("/api/games/:gameId/round", async (c) => {
    const gameId = c.req.param("gameId");
    const { gameGateway, roundGateway, sessions } = createContext();
    await gameGateway.loadGame(gameId);

    const round = await roundGateway.currentRound(gameId);
    if (!round) {
      return c.json({ error: "No round left in this game" }, 404);
    }

    const session = await sessions.getState(gameId);
    const revealCount =
      session.status === "running" && session.state.roundId === round.id
        ? session.state.keywordsRevealed
        : 0;

    return c.json({
      id: round.id,
      position: round.position,
      state: round.state,
      possibleWordIds: round.possibleWordIds,
      keywordsTotal: round.keywordIds.length,
      revealedKeywordIds: round.keywordIds.slice(0, revealCount),
    });
  });

  app.post("/api/rounds/:roundId/picks", async (c) => {
    const body = await readBody(c, PickBodySchema);
    if (!body.ok) {
      return c.json({ error: "Invalid request body", issues: body.issues }, 400);
    }
    const context = createContext();
    const pick = await dispatch(
      new SubmitPick(
        c.req.param("roundId"),
        body.data.playerId,
        body.data.wordId,
        context.scheduler.now(),
      ),
      context,
    );
    return c.json(pick, 201);
  });

  return app;
}

async function readBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<BodyResult<T>> {
  const raw = await c.req.json<unknown>().catch(() => undefined);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: describeIssues(parsed.error) };
  }
  return { ok: true, data: parsed.data };
}
