/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { WebSocket } from "ws";

import {
  InMemoryMessageBus,
  type BusEvent,
  type BusListener,
  type Logger,
  type MessageBus,
  type PublishedEvent,
  type Unsubscribe,
} from "../core.js";

/** The part of a `ws` socket the bus relies on */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

type Waiter = {
  readonly predicate: (payload: PublishedEvent) => boolean;
  readonly resolve: (payload: PublishedEvent) => void;
  readonly reject: (error: Error) => void;
  timeout?: ReturnType<typeof setTimeout>;
};

/**
 * Message bus for a single server process. Events go out as JSON to every
 * socket attached to the topic, then to in-process subscribers.
 */
export class WebSocketBus implements MessageBus {
  #clients: Map<string, Set<ClientSocket>> = new Map();
  #waiters: Set<Waiter> = new Set();
  readonly #local: InMemoryMessageBus;
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
    this.#local = new InMemoryMessageBus({ logger });
  }

  clientCount(topic: string): number {
    return this.#clients.get(topic)?.size ?? 0;
  }

  async publish(topic: string, event: BusEvent): Promise<void> {
    const connections = this.#clients.get(topic);

    if (connections) {
      const message = JSON.stringify({ topic, event });
      for (const socket of connections) {
        if (socket.readyState !== WebSocket.OPEN) {
          continue;
        }
        try {
          socket.send(message);
        } catch (error) {
          this.#logger?.warn?.("Failed to deliver event", { topic, error });
        }
      }
    }

    this.#resolveWaiters({ topic, event });
    this.#logger?.debug?.("Event published", { topic, type: event.type });

    await this.#local.publish(topic, event);
  }

  subscribe(topic: string, listener: BusListener): Unsubscribe {
    return this.#local.subscribe(topic, listener);
  }

  /** Forward the topic's events to the socket until it closes */
  attach(topic: string, socket: ClientSocket): void {
    let connections = this.#clients.get(topic);
    if (!connections) {
      connections = new Set<ClientSocket>();
      this.#clients.set(topic, connections);
    }
    connections.add(socket);

    this.#logger?.info?.("WebSocket client attached", {
      topic,
      size: connections.size,
    });

    socket.on("close", () => {
      this.detach(topic, socket);
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn?.("WebSocket client error", { topic, error });
    });
  }

  detach(topic: string, socket: ClientSocket): void {
    const connections = this.#clients.get(topic);
    if (!connections?.delete(socket)) {
      return;
    }
    if (connections.size === 0) {
      this.#clients.delete(topic);
    }
    this.#logger?.info?.("WebSocket client detached", {
      topic,
      size: connections.size,
    });
  }

  waitFor(predicate: Waiter["predicate"], timeoutMs = 5000): Promise<PublishedEvent> {
    return new Promise<PublishedEvent>((resolve, reject) => {
      const waiter: Waiter = { predicate, resolve, reject };

      if (timeoutMs > 0) {
        waiter.timeout = setTimeout(() => {
          this.#waiters.delete(waiter);
          reject(new Error("Timed out waiting for event"));
        }, timeoutMs);
      }

      this.#waiters.add(waiter);
    });
  }

  #resolveWaiters(payload: PublishedEvent): void {
    for (const waiter of [...this.#waiters]) {
      if (!waiter.predicate(payload)) {
        continue;
      }
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      this.#waiters.delete(waiter);
      waiter.resolve(payload);
    }
  }
}
