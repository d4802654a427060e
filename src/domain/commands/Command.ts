import type { SessionConfig } from "../GameConfig.js";
import type { GameGateway } from "../ports/GameGateway.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { RoundGateway } from "../ports/RoundGateway.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { WordCatalog } from "../ports/WordCatalog.js";
import type { HostMonitor } from "../presence/HostPresenceMonitor.js";
import type { TimeoutWatcher } from "../session/RoundTimeoutWatcher.js";
import type { GameSessions } from "../session/SessionRegistry.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly gameGateway: GameGateway;
  readonly roundGateway: RoundGateway;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly sessions: GameSessions;
  readonly wordCatalog: WordCatalog;
  readonly config: SessionConfig;
  readonly hostMonitor?: HostMonitor;
  readonly timeoutWatcher?: TimeoutWatcher;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
