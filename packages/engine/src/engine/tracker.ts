// ─── Tracker Pipeline ──────────────────────────────────────────────
// Builds a store, replays a whole game log into it in order and
// serializes the result. Also the parse boundary for the log and the
// tracker config.

import type { GameLog, GameSnapshot, TrackerConfig } from "../types/index";
import { safeParseGameLog, safeParseTrackerConfig } from "@innovation-tracker/schema";
import type { CardDatabase } from "../cards/card-database";
import { formatIssues, TrackerParseError } from "./errors";
import { applyEvent, describeCommand } from "./event-interpreter";
import { GameState } from "./game-state";
import { createConsoleLogger, type Logger } from "./logger";
import { toSnapshot } from "./snapshot";

// ─── Parse Boundary ────────────────────────────────────────────────

/**
 * Validates a raw normalized game log.
 * @throws {TrackerParseError} if it does not conform to the schema.
 */
export function loadGameLog(raw: unknown): GameLog {
  const result = safeParseGameLog(raw);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new TrackerParseError(`Invalid game log: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

/**
 * Validates a raw tracker config; `logLevel` defaults to "warn".
 * @throws {TrackerParseError} if it does not conform to the schema.
 */
export function loadTrackerConfig(raw: unknown): TrackerConfig {
  const result = safeParseTrackerConfig(raw);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new TrackerParseError(`Invalid tracker config: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

// ─── trackGame ─────────────────────────────────────────────────────

export interface TrackGameResult {
  readonly state: GameState;
  readonly snapshot: GameSnapshot;
  readonly applied: number;
  readonly ignored: number;
}

/** A store for a new game with the opening deal already made. */
export function createGame(
  db: CardDatabase,
  config: TrackerConfig,
  logger: Logger = createConsoleLogger(config.logLevel)
): GameState {
  const state = new GameState(db, {
    players: config.players,
    perspective: config.perspective,
    logger,
  });
  state.setupInitialDeal();
  return state;
}

/**
 * Replays every event of `log` in order. The first event that cannot be
 * interpreted or applied aborts the run with its error.
 */
export function trackGame(
  db: CardDatabase,
  log: GameLog,
  config: TrackerConfig,
  logger: Logger = createConsoleLogger(config.logLevel)
): TrackGameResult {
  const state = createGame(db, config, logger);
  let applied = 0;
  let ignored = 0;

  for (const event of log.log) {
    const command = applyEvent(state, event);
    if (command.kind === "ignore") ignored++;
    else applied++;
    logger.debug(`move ${event.move}: ${describeCommand(command)}`);
  }

  logger.info(
    `Tracked ${log.log.length} event(s) for ${config.players.join(" vs ")}: ${applied} applied, ${ignored} ignored`
  );

  return { state, snapshot: toSnapshot(state), applied, ignored };
}
