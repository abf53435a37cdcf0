// ─── Track Table ───────────────────────────────────────────────────
// File-to-file pipeline: card database + game log in, snapshot out.
// Input and tracking failures come back as an error result; anything
// that is not a tracker failure propagates.

import {
  TrackerError,
  trackGame,
  type Logger,
  type TrackGameResult,
  type TrackerConfig,
} from "@innovation-tracker/engine";

import { importCardDatabase, importGameLog } from "./import/file-importer";
import { writeSnapshot } from "./output/snapshot-writer";

export interface TrackTableOptions {
  readonly cardInfoPath: string;
  readonly gameLogPath: string;
  readonly config: TrackerConfig;
  /** Where to write the snapshot; nothing is written when absent. */
  readonly outputPath?: string;
  readonly logger?: Logger;
}

export type TrackTableResult =
  | {
      readonly ok: true;
      readonly result: TrackGameResult;
      readonly outputPath: string | null;
    }
  | { readonly ok: false; readonly error: string };

export async function trackTable(options: TrackTableOptions): Promise<TrackTableResult> {
  const db = await importCardDatabase(options.cardInfoPath);
  if (!db.ok) {
    return { ok: false, error: `${options.cardInfoPath}: ${db.error}` };
  }

  const log = await importGameLog(options.gameLogPath);
  if (!log.ok) {
    return { ok: false, error: `${options.gameLogPath}: ${log.error}` };
  }

  let result: TrackGameResult;
  try {
    result = trackGame(db.value, log.value, options.config, options.logger);
  } catch (err) {
    if (err instanceof TrackerError) {
      return { ok: false, error: `${err.name}: ${err.message}` };
    }
    throw err;
  }

  const outputPath = options.outputPath ?? null;
  if (outputPath !== null) {
    await writeSnapshot(outputPath, result.snapshot);
  }
  return { ok: true, result, outputPath };
}
