// ─── @innovation-tracker/engine ────────────────────────────────────
// Hidden-state tracking core. Pure TypeScript, no Node APIs.
// Re-exports all public types, engine functions, and utilities.

export * from "./types/index";
export * from "./cards/index";
export * from "./engine/index";
