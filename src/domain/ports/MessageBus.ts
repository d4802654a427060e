import type { BusEvent } from "../events.js";

export type BusListener = (event: BusEvent) => void | Promise<void>;

export type Unsubscribe = () => void;

/**
 * Topic-based publish/subscribe. Delivery is at-least-once to whoever is
 * subscribed when the event is published; nothing is replayed.
 *
 * Listeners run before `publish` resolves. A listener must never wait on the
 * component that published the event; work that would has to be handed to the
 * {@link Scheduler} instead.
 */
export interface MessageBus {
  publish(topic: string, event: BusEvent): Promise<void>;
  subscribe(topic: string, listener: BusListener): Unsubscribe;
}
