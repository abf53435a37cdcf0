// ─── Snapshot ──────────────────────────────────────────────────────
// Serializes the store into the presentation layer's view: known cards
// by display name, unknown cards by (age, set), draw stacks top first,
// and the age achievements deduced from cards never accounted for.

import type {
  GameSnapshot,
  SnapshotCard,
  SnapshotDeck,
} from "../types/index";
import { ACHIEVEMENT_AGES, CardSet, SET_LABELS } from "../types/index";
import type { Card } from "../cards/card";
import { compareSortKeys, type CardDatabase } from "../cards/card-database";
import { compareGroupKeys } from "./group-key";
import type { GameState } from "./game-state";

/**
 * Lists a hand or score pile: identified cards first in display order,
 * then the unidentified ones by age and set.
 */
function describePrivateZone(db: CardDatabase, cards: readonly Card[]): SnapshotCard[] {
  const known: { name: string; card: Card }[] = [];
  const unknown: Card[] = [];
  for (const card of cards) {
    const name = card.resolvedName;
    if (name === null) unknown.push(card);
    else known.push({ name, card });
  }

  known.sort((a, b) => compareSortKeys(db.sortKey(a.name), db.sortKey(b.name)));
  unknown.sort((a, b) => compareGroupKeys(a.group, b.group));

  return [
    ...known.map(({ name, card }): SnapshotCard => ({
      kind: "known",
      name: db.displayName(name),
      revealed: card.opponentKnowsExact,
    })),
    ...unknown.map((card): SnapshotCard => ({
      kind: "unknown",
      age: card.age,
      set: card.set,
    })),
  ];
}

/** Board cards are identified by construction; any other is skipped. */
function describeBoard(db: CardDatabase, cards: readonly Card[]): string[] {
  const names: string[] = [];
  for (const card of cards) {
    const name = card.resolvedName;
    if (name !== null) names.push(name);
  }
  return names
    .sort((a, b) => compareSortKeys(db.sortKey(a), db.sortKey(b)))
    .map((name) => db.displayName(name));
}

function describeDecks(state: GameState): Record<string, SnapshotDeck> {
  const decks: Record<string, { base: (string | null)[]; cities: (string | null)[] }> = {};

  for (const key of state.db.groupKeys()) {
    const stack = state.drawStack(key);
    if (stack.length === 0) continue;

    const age = String(key.age);
    const entry = decks[age] ?? { base: [], cities: [] };
    decks[age] = entry;
    entry[SET_LABELS[key.set]] = stack.map((card) => {
      const name = card.resolvedName;
      return name === null ? null : state.db.displayName(name);
    });
  }
  return decks;
}

/**
 * For each age 1–9, the base card whose identity is not pinned to any
 * hand, board, score pile, revealed zone or draw stack. Exactly one
 * such name means it is the achievement; otherwise the slot is `null`.
 */
export function deduceAchievements(state: GameState): (string | null)[] {
  const accounted = new Set<string>();
  const located: Card[] = [];
  for (const player of state.players) {
    located.push(
      ...state.hand(player),
      ...state.board(player),
      ...state.score(player),
      ...state.revealed(player)
    );
  }
  for (const key of state.db.groupKeys()) {
    located.push(...state.drawStack(key));
  }
  for (const card of located) {
    const name = card.resolvedName;
    if (name !== null) accounted.add(name);
  }

  return ACHIEVEMENT_AGES.map((age) => {
    const hidden = state.db
      .namesForGroup({ age, set: CardSet.BASE })
      .filter((name) => !accounted.has(name));
    const [only] = hidden;
    return hidden.length === 1 && only !== undefined
      ? state.db.displayName(only)
      : null;
  });
}

/** Serializes the full state from the perspective-holder's point of view. */
export function toSnapshot(state: GameState): GameSnapshot {
  const hands: Record<string, SnapshotCard[]> = {};
  const scores: Record<string, SnapshotCard[]> = {};
  const boards: Record<string, string[]> = {};

  for (const player of state.players) {
    hands[player] = describePrivateZone(state.db, state.hand(player));
    scores[player] = describePrivateZone(state.db, state.score(player));
    boards[player] = describeBoard(state.db, state.board(player));
  }

  return {
    perspective: state.perspective,
    players: [...state.players],
    hands,
    scores,
    boards,
    decks: describeDecks(state),
    achievements: deduceAchievements(state),
  };
}
