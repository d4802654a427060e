import type { PresenceEntries, PresenceMeta } from "../events.js";

/**
 * Tracks which connections are attached to a topic. Every change is published
 * on that same topic as a {@link PresenceDiff}.
 */
export interface PresenceTracker {
  track(topic: string, key: string, meta?: PresenceMeta): Promise<void>;
  untrack(topic: string, key: string): Promise<void>;
  list(topic: string): Promise<PresenceEntries>;
}
