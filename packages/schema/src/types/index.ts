export {
  ACHIEVEMENT_AGES,
  CardSet,
  LABEL_TO_SET,
  LOCATION_KINDS,
  MAX_AGE,
  MIN_AGE,
  PRIVATE_LOCATIONS,
  PUBLIC_LOCATIONS,
  SET_LABELS,
  toIndexName,
} from "./card";
export type { CardDefinition, GroupKey, LocationKind, SetLabel } from "./card";
export type { GameLog, GameLogEvent, HandRevealEvent, MessageEvent, TransferEvent } from "./events";
export type { GameSnapshot, SnapshotCard, SnapshotDeck } from "./snapshot";
export type { LogLevel, TrackerConfig } from "./config";
