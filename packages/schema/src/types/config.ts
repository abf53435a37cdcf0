// ─── Tracker Configuration ─────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "silent";

/**
 * Who is playing and from whose point of view hidden information is
 * tracked. Passed explicitly to the engine; never read from the
 * environment inside it.
 */
export interface TrackerConfig {
  readonly perspective: string;
  /** Roster in seating order. */
  readonly players: readonly string[];
  readonly logLevel: LogLevel;
}
