// ─── Snapshot Writer ───────────────────────────────────────────────
// Persists a snapshot as pretty-printed JSON, creating the parent
// directory on first write.

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { GameSnapshot } from "@innovation-tracker/engine";

export async function writeSnapshot(filePath: string, snapshot: GameSnapshot): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
}
