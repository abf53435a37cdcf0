#!/usr/bin/env tsx
// ─── Track State ───────────────────────────────────────────────────
// CLI script that replays one table's normalized game log and prints
// (or writes) the reconstructed snapshot.
//
// Usage: track-state <card-info.json> <game-log.json> <opponent> [output.json]
// The perspective player comes from PLAYER_NAME; TRACKER_LOG_LEVEL sets
// the log level (default "warn").
// Exits 0 on success, 1 on any input or tracking failure.

import {
  TrackerParseError,
  createConsoleLogger,
  loadTrackerConfig,
  type TrackerConfig,
} from "../packages/engine/src/index";
import { trackTable } from "../packages/loader/src/index";

const USAGE =
  "Usage: track-state <card-info.json> <game-log.json> <opponent> [output.json]";

async function main(): Promise<number> {
  const [cardInfoPath, gameLogPath, opponent, outputPath] = process.argv.slice(2);
  if (!cardInfoPath || !gameLogPath || !opponent) {
    console.error(USAGE);
    return 1;
  }

  const playerName = process.env.PLAYER_NAME;
  if (!playerName) {
    console.error("PLAYER_NAME must name the player whose view is tracked.");
    return 1;
  }

  let config: TrackerConfig;
  try {
    config = loadTrackerConfig({
      perspective: playerName,
      players: [playerName, opponent],
      logLevel: process.env.TRACKER_LOG_LEVEL,
    });
  } catch (err) {
    if (!(err instanceof TrackerParseError)) throw err;
    console.error(err.message);
    for (const issue of err.issues) {
      console.error(`  ${issue}`);
    }
    return 1;
  }

  const outcome = await trackTable({
    cardInfoPath,
    gameLogPath,
    config,
    outputPath,
    logger: createConsoleLogger(config.logLevel),
  });

  if (!outcome.ok) {
    console.error(outcome.error);
    return 1;
  }

  const { result } = outcome;
  if (outcome.outputPath === null) {
    console.log(JSON.stringify(result.snapshot, null, 2));
  } else {
    console.error(
      `Wrote ${outcome.outputPath} (${result.applied} applied, ${result.ignored} ignored).`
    );
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
