// ─── @innovation-tracker/schema ────────────────────────────────────
// Data contracts shared by the tracker packages: card database rows,
// normalized log events, tracker config and the output snapshot.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index";
export * from "./schema/index";
