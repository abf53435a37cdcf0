// ─── Zod Issue Formatter ───────────────────────────────────────────
// Converts Zod validation issues into a single human-readable error
// string for import results.

import { formatIssues } from "@innovation-tracker/engine";

/**
 * Formats Zod issues as `path: message` entries joined by "; ".
 * Root-level issues (empty path) use `(root)` as the path label.
 *
 * @example
 * formatZodIssues([{ path: ["log", 0, "move"], message: "Required" }])
 * // => "Validation failed: log.0.move: Required"
 */
export function formatZodIssues(issues: Parameters<typeof formatIssues>[0]): string {
  return `Validation failed: ${formatIssues(issues).join("; ")}`;
}
