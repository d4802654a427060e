/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { BusEvent } from "../../domain/events.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type {
  BusListener,
  MessageBus,
  Unsubscribe,
} from "../../domain/ports/MessageBus.js";

export interface PublishedEvent<TEvent extends BusEvent = BusEvent> {
  readonly topic: string;
  readonly event: TEvent;
}

/**
 * In-process topic bus. Listeners are called in subscription order; a
 * failing listener is logged and does not keep the others from running.
 */
export class InMemoryMessageBus implements MessageBus {
  #listeners: Map<string, Set<BusListener>> = new Map();
  #published: PublishedEvent[] = [];
  readonly #logger: Logger | undefined;
  readonly #record: boolean;

  constructor(options: { readonly logger?: Logger; readonly record?: boolean } = {}) {
    this.#logger = options.logger;
    this.#record = options.record ?? false;
  }

  /** Every event published so far, when recording is enabled */
  get published(): readonly PublishedEvent[] {
    return this.#published;
  }

  eventsOn(topic: string): readonly BusEvent[] {
    return this.#published
      .filter((entry) => entry.topic === topic)
      .map((entry) => entry.event);
  }

  subscriberCount(topic: string): number {
    return this.#listeners.get(topic)?.size ?? 0;
  }

  async publish(topic: string, event: BusEvent): Promise<void> {
    if (this.#record) {
      this.#published.push({ topic, event });
    }

    const listeners = this.#listeners.get(topic);
    if (!listeners) {
      return;
    }

    for (const listener of [...listeners]) {
      try {
        await listener(event);
      } catch (error) {
        this.#logger?.warn?.("Bus listener failed", { topic, type: event.type, error });
      }
    }
  }

  subscribe(topic: string, listener: BusListener): Unsubscribe {
    let listeners = this.#listeners.get(topic);
    if (!listeners) {
      listeners = new Set();
      this.#listeners.set(topic, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.#listeners.get(topic);
      if (!current) {
        return;
      }
      current.delete(listener);
      if (current.size === 0) {
        this.#listeners.delete(topic);
      }
    };
  }
}
