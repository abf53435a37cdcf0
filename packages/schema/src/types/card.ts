// ─── Card Primitives ───────────────────────────────────────────────
// Static card metadata, expansion sets, identity groups and the
// location kinds a card can occupy during a game.

// ─── Card Set ──────────────────────────────────────────────────────

/** Numeric set codes as they appear in the card database. */
export const CardSet = {
  BASE: 0,
  CITIES: 3,
} as const;

export type CardSet = (typeof CardSet)[keyof typeof CardSet];

/** Set labels used by the normalized game log and the snapshot. */
export type SetLabel = "base" | "cities";

export const SET_LABELS: Readonly<Record<CardSet, SetLabel>> = {
  [CardSet.BASE]: "base",
  [CardSet.CITIES]: "cities",
};

export const LABEL_TO_SET: Readonly<Record<SetLabel, CardSet>> = {
  base: CardSet.BASE,
  cities: CardSet.CITIES,
};

/** Ages that carry an achievement card. */
export const ACHIEVEMENT_AGES: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export const MIN_AGE = 1;
export const MAX_AGE = 10;

// ─── Card Definition ───────────────────────────────────────────────

/** One entry of the card database. `name` is the display name. */
export interface CardDefinition {
  readonly name: string;
  readonly age: number;
  readonly color: string;
  readonly set: CardSet;
}

/**
 * Normalizes a card name to its index form: the platform writes
 * non-breaking hyphens (U+2011) in some names.
 */
export function toIndexName(name: string): string {
  return name.replace(/\u2011/g, "-").toLowerCase();
}

// ─── Identity Group ────────────────────────────────────────────────

/**
 * An (age, set) pair. Identity names are unique within a group, and
 * every physical card belongs to exactly one group for its lifetime.
 */
export interface GroupKey {
  readonly age: number;
  readonly set: CardSet;
}

// ─── Locations ─────────────────────────────────────────────────────

/** Zones the tracker models as card containers. */
export type LocationKind = "deck" | "hand" | "board" | "score" | "revealed";

export const LOCATION_KINDS: readonly LocationKind[] = [
  "deck",
  "hand",
  "board",
  "score",
  "revealed",
];

/** Zones only their owner can see. */
export const PRIVATE_LOCATIONS: readonly LocationKind[] = ["hand", "score"];

/** Zones both players can see. */
export const PUBLIC_LOCATIONS: readonly LocationKind[] = ["board", "revealed"];
