// ─── @innovation-tracker/loader ────────────────────────────────────
// Node-side file boundary around the tracking engine.

export { importCardDatabase, importGameLog, type FileImportResult } from "./import/file-importer";
export { formatZodIssues } from "./import/format-zod-issues";
export { writeSnapshot } from "./output/snapshot-writer";
export { trackTable, type TrackTableOptions, type TrackTableResult } from "./track-table";
