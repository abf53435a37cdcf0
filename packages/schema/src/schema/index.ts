export {
  CardDatabaseSchema,
  GameLogEventSchema,
  GameLogSchema,
  GameSnapshotSchema,
  TrackerConfigSchema,
  parseCardDatabase,
  parseGameLog,
  parseTrackerConfig,
  safeParseCardDatabase,
  safeParseGameLog,
  safeParseGameSnapshot,
  safeParseTrackerConfig,
} from "./validation";
export type {
  ParsedCardDatabase,
  ParsedGameLog,
  ParsedGameSnapshot,
  ParsedTrackerConfig,
} from "./validation";
