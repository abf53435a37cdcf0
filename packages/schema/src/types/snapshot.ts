// ─── Game Snapshot ─────────────────────────────────────────────────
// Final state handed to the presentation layer. Cards are shown by
// display name when their identity is known, by (age, set) otherwise.

import type { CardSet } from "./card";

/** A card in a hand or score pile. */
export type SnapshotCard =
  | {
      readonly kind: "known";
      readonly name: string;
      /** Whether the opponent can name this card with certainty. */
      readonly revealed: boolean;
    }
  | { readonly kind: "unknown"; readonly age: number; readonly set: CardSet };

/** One age's draw stacks, top first. `null` marks an unidentified card. */
export interface SnapshotDeck {
  readonly base: readonly (string | null)[];
  readonly cities: readonly (string | null)[];
}

export interface GameSnapshot {
  readonly perspective: string;
  readonly players: readonly string[];
  readonly hands: Readonly<Record<string, readonly SnapshotCard[]>>;
  readonly scores: Readonly<Record<string, readonly SnapshotCard[]>>;
  readonly boards: Readonly<Record<string, readonly string[]>>;
  /** Keyed by age; ages whose stacks are all empty are omitted. */
  readonly decks: Readonly<Record<string, SnapshotDeck>>;
  /** Nine slots, ages 1–9. */
  readonly achievements: readonly (string | null)[];
}
