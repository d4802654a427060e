import {
  CleanupGameOnHostDisconnect,
  FinishRound,
  HostPresenceMonitor,
  InMemoryGameGateway,
  InMemoryPresence,
  InMemoryRoundGateway,
  LobbySweeper,
  RoundTimeoutWatcher,
  SessionRegistry,
  TimeoutLobbies,
  dispatchCommand,
  type CommandContext,
  type Logger,
  type MessageBus,
  type PresenceTracker,
  type Scheduler,
  type SessionConfig,
  type WordCatalog,
} from "./core.js";

export interface RuntimeOptions {
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly wordCatalog: WordCatalog;
  readonly config: SessionConfig;
  readonly logger?: Logger;
}

export interface Runtime {
  readonly context: CommandContext;
  readonly presence: PresenceTracker;
  readonly sessions: SessionRegistry;
  readonly hostMonitor: HostPresenceMonitor;
  readonly timeoutWatcher: RoundTimeoutWatcher;
  readonly sweeper: LobbySweeper;
  shutdown(): Promise<void>;
}

/**
 * Wire the in-memory stores, the session registry and the background
 * watchers around one bus and one scheduler. The lobby sweeper is created
 * stopped.
 */
export function createRuntime({
  bus,
  scheduler,
  wordCatalog,
  config,
  logger,
}: RuntimeOptions): Runtime {
  const gameGateway = new InMemoryGameGateway();
  const roundGateway = new InMemoryRoundGateway(gameGateway);
  const presence = new InMemoryPresence(bus);

  const sessions = new SessionRegistry({
    roundGateway,
    bus,
    scheduler,
    config,
    logger,
  });

  const hostMonitor = new HostPresenceMonitor({
    bus,
    presence,
    gameGateway,
    scheduler,
    debounceMs: config.hostDisconnectDebounceMs,
    cleanup: (gameId) =>
      dispatchCommand(new CleanupGameOnHostDisconnect(gameId, scheduler.now()), context),
    logger,
  });

  const timeoutWatcher = new RoundTimeoutWatcher({
    bus,
    scheduler,
    onTimeout: (_gameId, roundId, at) =>
      dispatchCommand(new FinishRound(roundId, "timeout", at), context),
    logger,
  });

  const context: CommandContext = {
    gameGateway,
    roundGateway,
    bus,
    scheduler,
    sessions,
    wordCatalog,
    config,
    hostMonitor,
    timeoutWatcher,
    logger,
  };

  const sweeper = new LobbySweeper({
    scheduler,
    intervalMs: config.lobbySweepIntervalMs,
    sweep: (at) => dispatchCommand(new TimeoutLobbies(at), context),
    logger,
  });

  return {
    context,
    presence,
    sessions,
    hostMonitor,
    timeoutWatcher,
    sweeper,
    async shutdown(): Promise<void> {
      sweeper.stop();
      hostMonitor.stop();
      timeoutWatcher.stop();
      await sessions.terminateAll();
    },
  };
}
