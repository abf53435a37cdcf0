export { GameState, type Action, type CardRef, type GameStateOptions } from "./game-state";
export { propagateGroup, eliminateSingletons, resolveHiddenSingles, eliminateNakedSubsets, eliminateSuspects, combinations } from "./propagation";
export { interpretEvent, applyEvent, describeCommand, type TrackerCommand, type InterpretContext } from "./event-interpreter";
export { toSnapshot, deduceAchievements } from "./snapshot";
export { trackGame, createGame, loadGameLog, loadTrackerConfig, type TrackGameResult } from "./tracker";
export { groupKeyId, sameGroup, compareGroupKeys } from "./group-key";
export { createConsoleLogger, silentLogger, type Logger } from "./logger";
export {
  TrackerError,
  UnrecognizedEventError,
  InconsistentSourceError,
  EmptyDrawStackError,
  UnknownCardError,
  ContradictionError,
  TrackerParseError,
  formatIssues,
} from "./errors";
