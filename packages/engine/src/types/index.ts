// Re-export all types from the canonical schema package.
export { ACHIEVEMENT_AGES, CardSet, LABEL_TO_SET, LOCATION_KINDS, PRIVATE_LOCATIONS, PUBLIC_LOCATIONS, SET_LABELS } from "@innovation-tracker/schema";
export type { CardDefinition, GameLog, GameLogEvent, GameSnapshot, GroupKey, HandRevealEvent, LocationKind, LogLevel, MessageEvent, SetLabel, SnapshotCard, SnapshotDeck, TrackerConfig, TransferEvent } from "@innovation-tracker/schema";
