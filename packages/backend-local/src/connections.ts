/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import {
  LeaveLobby,
  gameTopic,
  hostTopic,
  type CommandContext,
  type GameId,
  type Logger,
  type PlayerId,
  type PresenceTracker,
} from "./core.js";
import type { ClientSocket } from "./adapters/WebSocketBus.js";
import type { DispatchCommand } from "./app.js";
import type { ConnectQuery } from "./schemas.js";

export interface SocketAttachments {
  attach(topic: string, socket: ClientSocket): void;
  detach(topic: string, socket: ClientSocket): void;
}

interface OpenConnection {
  readonly gameId: GameId;
  readonly identity: PlayerId;
  readonly role: ConnectQuery["role"];
  readonly socket: ClientSocket;
  /** Set when this socket counts as the host being present */
  readonly trackedAsHost: boolean;
}

interface ConnectionRegistryOptions {
  readonly sockets: SocketAttachments;
  readonly presence: Pick<PresenceTracker, "track" | "untrack">;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  readonly logger?: Logger;
}

/**
 * Book-keeping for game sockets. Every socket receives the game topic. A
 * socket opened by the game's host is tracked on the host topic so the
 * presence monitor can notice when the last one goes away; a player socket
 * closing during the lobby removes the player.
 */
export class ConnectionRegistry {
  #connections: Map<string, OpenConnection> = new Map();
  #nextKey = 1;
  readonly #options: ConnectionRegistryOptions;

  constructor(options: ConnectionRegistryOptions) {
    this.#options = options;
  }

  get size(): number {
    return this.#connections.size;
  }

  async open(gameId: GameId, query: ConnectQuery, socket: ClientSocket): Promise<string> {
    const { sockets, presence, createContext, logger } = this.#options;
    const key = `conn-${this.#nextKey++}`;

    const game = await createContext().gameGateway.findGame(gameId);
    const trackedAsHost = query.role === "host" && game?.host === query.identity;

    this.#connections.set(key, {
      gameId,
      identity: query.identity,
      role: query.role,
      socket,
      trackedAsHost,
    });
    sockets.attach(gameTopic(gameId), socket);

    if (trackedAsHost) {
      await presence.track(hostTopic(gameId), key, { identity: query.identity });
    } else if (query.role === "host") {
      logger?.warn?.("Host connection from a non-host identity", {
        gameId,
        identity: query.identity,
        exists: game !== undefined,
      });
    }

    logger?.info?.("Connection opened", { gameId, key, role: query.role });
    return key;
  }

  async close(key: string): Promise<void> {
    const connection = this.#connections.get(key);
    if (!connection) {
      return;
    }
    this.#connections.delete(key);

    const { sockets, presence, createContext, dispatch, logger } = this.#options;
    sockets.detach(gameTopic(connection.gameId), connection.socket);

    logger?.info?.("Connection closed", {
      gameId: connection.gameId,
      key,
      role: connection.role,
    });

    if (connection.trackedAsHost) {
      await presence.untrack(hostTopic(connection.gameId), key);
      return;
    }

    if (connection.role === "player" && !this.#hasOtherConnection(connection)) {
      const context = createContext();
      await dispatch(
        new LeaveLobby(connection.gameId, connection.identity, context.scheduler.now()),
        context,
      );
    }
  }

  #hasOtherConnection({ gameId, identity }: OpenConnection): boolean {
    for (const other of this.#connections.values()) {
      if (other.gameId === gameId && other.identity === identity) {
        return true;
      }
    }
    return false;
  }
}
