/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { PresenceEntries, PresenceMeta } from "../../domain/events.js";
import type { MessageBus } from "../../domain/ports/MessageBus.js";
import type { PresenceTracker } from "../../domain/ports/PresenceTracker.js";

/**
 * Presence for a single node: connections are tracked per topic and every
 * change is broadcast on that topic as a presence diff.
 */
export class InMemoryPresence implements PresenceTracker {
  #topics: Map<string, Map<string, PresenceMeta>> = new Map();
  readonly #bus: MessageBus;

  constructor(bus: MessageBus) {
    this.#bus = bus;
  }

  async track(topic: string, key: string, meta: PresenceMeta = {}): Promise<void> {
    let entries = this.#topics.get(topic);
    if (!entries) {
      entries = new Map();
      this.#topics.set(topic, entries);
    }
    entries.set(key, { ...meta });

    await this.#bus.publish(topic, {
      type: "PresenceDiff",
      topic,
      joins: { [key]: { ...meta } },
      leaves: {},
    });
  }

  async untrack(topic: string, key: string): Promise<void> {
    const entries = this.#topics.get(topic);
    const meta = entries?.get(key);
    if (!entries || meta === undefined) {
      return;
    }

    entries.delete(key);
    if (entries.size === 0) {
      this.#topics.delete(topic);
    }

    await this.#bus.publish(topic, {
      type: "PresenceDiff",
      topic,
      joins: {},
      leaves: { [key]: meta },
    });
  }

  async list(topic: string): Promise<PresenceEntries> {
    const entries = this.#topics.get(topic);
    return entries ? Object.fromEntries(entries) : {};
  }
}
