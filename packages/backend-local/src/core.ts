export type {
  Command,
  CommandContext,
} from "@hintline/core/domain/commands/Command.js";
export { CancelGame } from "@hintline/core/domain/commands/CancelGame.js";
export { CleanupGameOnHostDisconnect } from "@hintline/core/domain/commands/CleanupGameOnHostDisconnect.js";
export { CreateGame } from "@hintline/core/domain/commands/CreateGame.js";
export { FinishRound } from "@hintline/core/domain/commands/FinishRound.js";
export { JoinGame } from "@hintline/core/domain/commands/JoinGame.js";
export { LeaveLobby } from "@hintline/core/domain/commands/LeaveLobby.js";
export { StartGame } from "@hintline/core/domain/commands/StartGame.js";
export { StopGame } from "@hintline/core/domain/commands/StopGame.js";
export { SubmitPick } from "@hintline/core/domain/commands/SubmitPick.js";
export { TimeoutLobbies } from "@hintline/core/domain/commands/TimeoutLobbies.js";
export { dispatchCommand } from "@hintline/core/domain/commands/dispatchCommand.js";
export {
  DuplicatePickError,
  GameCommandInputError,
  GameNotFoundError,
  InvalidGameStateError,
  InvalidRoundStateError,
  RoundNotFoundError,
} from "@hintline/core/domain/errors/index.js";
export { gameTopic, hostTopic } from "@hintline/core/domain/events.js";
export type { BusEvent, PresenceMeta } from "@hintline/core/domain/events.js";
export type {
  GameConfig,
  SessionConfig,
  SessionConfigOverrides,
} from "@hintline/core/domain/GameConfig.js";
export {
  createGameConfig,
  createSessionConfig,
} from "@hintline/core/domain/GameConfig.js";
export { LobbySweeper } from "@hintline/core/domain/lobby/LobbySweeper.js";
export type {
  GameGateway,
  GameState,
  PlayerState,
} from "@hintline/core/domain/ports/GameGateway.js";
export type { Logger } from "@hintline/core/domain/ports/Logger.js";
export type {
  BusListener,
  MessageBus,
  Unsubscribe,
} from "@hintline/core/domain/ports/MessageBus.js";
export type { PresenceTracker } from "@hintline/core/domain/ports/PresenceTracker.js";
export type {
  PickState,
  RoundGateway,
  RoundState,
} from "@hintline/core/domain/ports/RoundGateway.js";
export type {
  ScheduledHandle,
  ScheduledTask,
  Scheduler,
} from "@hintline/core/domain/ports/Scheduler.js";
export type { WordCatalog } from "@hintline/core/domain/ports/WordCatalog.js";
export { HostPresenceMonitor } from "@hintline/core/domain/presence/HostPresenceMonitor.js";
export { RoundTimeoutWatcher } from "@hintline/core/domain/session/RoundTimeoutWatcher.js";
export { SessionRegistry } from "@hintline/core/domain/session/SessionRegistry.js";
export type {
  GameId,
  PlayerId,
  RoundId,
  TimePoint,
  WordId,
} from "@hintline/core/domain/typedefs.js";
export { InMemoryGameGateway } from "@hintline/core/adapters/in-memory/InMemoryGameGateway.js";
export {
  InMemoryMessageBus,
  type PublishedEvent,
} from "@hintline/core/adapters/in-memory/InMemoryMessageBus.js";
export { InMemoryPresence } from "@hintline/core/adapters/in-memory/InMemoryPresence.js";
export { InMemoryRoundGateway } from "@hintline/core/adapters/in-memory/InMemoryRoundGateway.js";
export {
  StaticWordCatalog,
  type CatalogWord,
} from "@hintline/core/adapters/in-memory/StaticWordCatalog.js";
export { InMemoryScheduler } from "@hintline/core/adapters/in-memory/InMemoryScheduler.js";
