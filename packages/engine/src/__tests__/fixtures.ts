// ─── Test Fixtures ─────────────────────────────────────────────────
// Small card databases and store factories shared by the engine tests.

import type { CardDefinition } from "../types/index";
import { CardSet } from "../types/index";
import { Card } from "../cards/card";
import { CardDatabase } from "../cards/card-database";
import { GameState } from "../engine/game-state";

export const ME = "Me";
export const OPP = "Opponent";
export const PLAYERS = [ME, OPP] as const;

/** One complete age-3 base group: five identities. */
export const AGE_3_CARDS: readonly CardDefinition[] = [
  { name: "Paper", age: 3, color: "green", set: CardSet.BASE },
  { name: "Compass", age: 3, color: "blue", set: CardSet.BASE },
  { name: "Education", age: 3, color: "yellow", set: CardSet.BASE },
  { name: "Alchemy", age: 3, color: "purple", set: CardSet.BASE },
  { name: "Translation", age: 3, color: "red", set: CardSet.BASE },
];

export const AGE_3_NAMES = ["paper", "compass", "education", "alchemy", "translation"];

export const AGE_3 = { age: 3, set: CardSet.BASE } as const;

/** The age-3 group with a sixth identity, for longer move sequences. */
export const AGE_3_SIX_CARDS: readonly CardDefinition[] = [
  ...AGE_3_CARDS,
  { name: "Medicine", age: 3, color: "yellow", set: CardSet.BASE },
];

export const AGE_3_SIX_NAMES = [...AGE_3_NAMES, "medicine"];

/**
 * A database with every base age 1–10 plus a small cities age-1 group,
 * large enough for the opening deal of two players.
 *
 * Age 1 base (database order): Archery, Metalworking, Oars, Clothing,
 * Sailing, Pottery, Tools. Ages 2–9 base: "Blue N", "Red N", "Green N".
 * Age 10 base: "Blue 10", "Red 10". Cities age 1: Athens, Rome.
 */
export function makeFullDefinitions(): CardDefinition[] {
  const defs: CardDefinition[] = [
    { name: "Archery", age: 1, color: "red", set: CardSet.BASE },
    { name: "Metalworking", age: 1, color: "red", set: CardSet.BASE },
    { name: "Oars", age: 1, color: "red", set: CardSet.BASE },
    { name: "Clothing", age: 1, color: "green", set: CardSet.BASE },
    { name: "Sailing", age: 1, color: "green", set: CardSet.BASE },
    { name: "Pottery", age: 1, color: "blue", set: CardSet.BASE },
    { name: "Tools", age: 1, color: "blue", set: CardSet.BASE },
  ];
  for (let age = 2; age <= 9; age++) {
    for (const color of ["blue", "red", "green"]) {
      defs.push({ name: `${capitalize(color)} ${age}`, age, color, set: CardSet.BASE });
    }
  }
  defs.push({ name: "Blue 10", age: 10, color: "blue", set: CardSet.BASE });
  defs.push({ name: "Red 10", age: 10, color: "red", set: CardSet.BASE });
  defs.push({ name: "Athens", age: 1, color: "yellow", set: CardSet.CITIES });
  defs.push({ name: "Rome", age: 1, color: "purple", set: CardSet.CITIES });
  return defs;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function makeAge3Database(): CardDatabase {
  return new CardDatabase(AGE_3_CARDS);
}

/** A store over the age-3 group only; every card starts in the draw stack. */
export function makeAge3State(perspective: string = ME): GameState {
  return new GameState(makeAge3Database(), { players: [...PLAYERS], perspective });
}

export function makeSixCardState(): GameState {
  return new GameState(new CardDatabase(AGE_3_SIX_CARDS), {
    players: [...PLAYERS],
    perspective: ME,
  });
}

/** A loose card for propagation tests, with optional opponent knowledge. */
export function makeCard(
  candidates: readonly string[],
  opts: { knows?: boolean; suspect?: readonly string[]; explicit?: boolean } = {}
): Card {
  const card = new Card(3, CardSet.BASE, candidates);
  card.opponentKnowsExact = opts.knows ?? false;
  card.opponentMightSuspect = new Set(opts.suspect ?? []);
  card.suspectListExplicit = opts.explicit ?? false;
  return card;
}

/** Named draw from the draw stack into a player's zone. */
export function drawNamed(
  state: GameState,
  name: string,
  dest: "hand" | "board" | "score" | "revealed",
  player: string
): Card {
  return state.move({
    source: "deck",
    sourcePlayer: null,
    dest,
    destPlayer: player,
    card: { kind: "named", name },
  });
}

/** Identity-less draw of an age-3 base card into a player's hand. */
export function drawHidden(state: GameState, player: string): Card {
  return state.move({
    source: "deck",
    sourcePlayer: null,
    dest: "hand",
    destPlayer: player,
    card: { kind: "hidden", group: AGE_3 },
  });
}

/** Sorted candidate list, for readable assertions. */
export function candidatesOf(card: Card): string[] {
  return [...card.candidates].sort();
}

export function suspectsOf(card: Card): string[] {
  return [...card.opponentMightSuspect].sort();
}

/**
 * Whether the cards' candidate sets still admit a one-to-one assignment
 * onto `names` (exhaustive search; small groups only).
 */
export function hasBijection(cards: readonly Card[], names: readonly string[]): boolean {
  if (cards.length !== names.length) return false;
  const used = new Set<string>();
  const assign = (index: number): boolean => {
    const card = cards[index];
    if (!card) return true;
    for (const name of card.candidates) {
      if (used.has(name) || !names.includes(name)) continue;
      used.add(name);
      if (assign(index + 1)) return true;
      used.delete(name);
    }
    return false;
  };
  return assign(0);
}

/** mulberry32: deterministic pseudo-random floats in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
