// ─── File Importer ─────────────────────────────────────────────────
// Reads the card database and the normalized game log from local JSON
// files and validates them before the engine sees them.

import { readFile } from "node:fs/promises";
import { safeParseGameLog } from "@innovation-tracker/schema";
import { CardDatabase, TrackerParseError, type GameLog } from "@innovation-tracker/engine";

import { formatZodIssues } from "./format-zod-issues";

/** Result of a file import attempt. Discriminated union. */
export type FileImportResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

async function readJsonFile(filePath: string): Promise<FileImportResult<unknown>> {
  if (!filePath.endsWith(".json")) {
    return { ok: false, error: "File must have a .json extension." };
  }

  // ── Read file contents ───────────────────────────────────────────
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Failed to read file: ${message}` };
  }

  // ── Parse JSON ───────────────────────────────────────────────────
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "File is not valid JSON." };
  }
  return { ok: true, value: json };
}

/**
 * Reads the platform's card list and builds the card database from its
 * base and cities rows.
 *
 * @param filePath - Path to the card info .json file.
 */
export async function importCardDatabase(
  filePath: string
): Promise<FileImportResult<CardDatabase>> {
  const file = await readJsonFile(filePath);
  if (!file.ok) return file;

  try {
    return { ok: true, value: CardDatabase.fromRaw(file.value) };
  } catch (err) {
    if (err instanceof TrackerParseError) {
      return { ok: false, error: `Validation failed: ${err.issues.join("; ")}` };
    }
    throw err;
  }
}

/**
 * Reads a normalized game log, filling the defaults of absent fields.
 *
 * @param filePath - Path to the game log .json file.
 */
export async function importGameLog(filePath: string): Promise<FileImportResult<GameLog>> {
  const file = await readJsonFile(filePath);
  if (!file.ok) return file;

  const result = safeParseGameLog(file.value);
  if (!result.success) {
    return { ok: false, error: formatZodIssues(result.error.issues) };
  }
  return { ok: true, value: result.data };
}
