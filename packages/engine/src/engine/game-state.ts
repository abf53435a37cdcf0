// ─── Game State Store ──────────────────────────────────────────────
// Owns every zone and identity group of one game. All mutations go
// through `move` and `revealHand`; both run constraint propagation over
// the affected group whenever an identity is narrowed.

import type { GroupKey, LocationKind } from "../types/index";
import {
  ACHIEVEMENT_AGES,
  CardSet,
  PRIVATE_LOCATIONS,
  PUBLIC_LOCATIONS,
} from "../types/index";
import { Card } from "../cards/card";
import type { CardDatabase } from "../cards/card-database";
import {
  EmptyDrawStackError,
  InconsistentSourceError,
  TrackerError,
} from "./errors";
import { groupKeyId, sameGroup } from "./group-key";
import { silentLogger, type Logger } from "./logger";
import { propagateGroup } from "./propagation";

// ─── Actions ───────────────────────────────────────────────────────

/** Which card an action moves: a named identity or any card of a group. */
export type CardRef =
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "hidden"; readonly group: GroupKey };

/**
 * One requested move. Players are `null` for the shared draw stacks.
 */
export interface Action {
  readonly source: LocationKind;
  readonly sourcePlayer: string | null;
  readonly dest: LocationKind;
  readonly destPlayer: string | null;
  readonly card: CardRef;
}

type PlayerLocation = Exclude<LocationKind, "deck">;

type PlayerZones = Record<PlayerLocation, Card[]>;

export interface GameStateOptions {
  /** Roster in seating order. */
  readonly players: readonly string[];
  /** The player whose knowledge is first-hand. */
  readonly perspective: string;
  readonly logger?: Logger;
}

/** Cards dealt to each player's hand at setup. */
const INITIAL_HAND_SIZE = 2;

// ─── GameState ─────────────────────────────────────────────────────

export class GameState {
  readonly db: CardDatabase;
  readonly players: readonly string[];
  readonly perspective: string;
  private readonly logger: Logger;

  /** Every card of each group, for propagation. Never changes after setup. */
  private readonly groups = new Map<string, Card[]>();
  /** Draw stacks per group; index 0 is the top. */
  private readonly decks = new Map<string, Card[]>();
  private readonly zones = new Map<string, PlayerZones>();
  private readonly achievements: Card[] = [];

  /**
   * Creates one card per database identity, all unresolved and stacked
   * in their group's draw stack.
   */
  constructor(db: CardDatabase, options: GameStateOptions) {
    if (new Set(options.players).size !== options.players.length) {
      throw new RangeError(`Duplicate player in roster: ${options.players.join(", ")}`);
    }
    if (!options.players.includes(options.perspective)) {
      throw new RangeError(`Perspective "${options.perspective}" is not in the roster`);
    }

    this.db = db;
    this.players = [...options.players];
    this.perspective = options.perspective;
    this.logger = options.logger ?? silentLogger;

    for (const key of db.groupKeys()) {
      const names = db.namesForGroup(key);
      const cards = names.map(() => new Card(key.age, key.set, names));
      this.groups.set(groupKeyId(key), cards);
      this.decks.set(groupKeyId(key), [...cards]);
    }

    for (const player of this.players) {
      this.zones.set(player, { hand: [], board: [], score: [], revealed: [] });
    }
  }

  /**
   * Sets aside one base card of each age 1–9 as the age achievements,
   * then deals the opening hands from the base age-1 stack. Both come
   * from the bottom of the stacks, so the top stays aligned with the
   * draws the log reports.
   */
  setupInitialDeal(): void {
    for (const age of ACHIEVEMENT_AGES) {
      this.achievements.push(this.takeFromBottom({ age, set: CardSet.BASE }));
    }

    for (const player of this.players) {
      const hand = this.playerZones(player).hand;
      for (let i = 0; i < INITIAL_HAND_SIZE; i++) {
        const card = this.takeFromBottom({ age: 1, set: CardSet.BASE });
        // The opponent knows their own opening hand.
        if (player !== this.perspective) card.opponentKnowsExact = true;
        hand.push(card);
      }
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────

  hand(player: string): readonly Card[] {
    return this.playerZones(player).hand;
  }

  board(player: string): readonly Card[] {
    return this.playerZones(player).board;
  }

  score(player: string): readonly Card[] {
    return this.playerZones(player).score;
  }

  revealed(player: string): readonly Card[] {
    return this.playerZones(player).revealed;
  }

  drawStack(key: GroupKey): readonly Card[] {
    return this.deckFor(key);
  }

  /** Cards set aside at setup, one per age 1–9. */
  achievementSlots(): readonly Card[] {
    return this.achievements;
  }

  groupCards(key: GroupKey): readonly Card[] {
    const cards = this.groups.get(groupKeyId(key));
    if (!cards) {
      throw new TrackerError(`No cards of age ${key.age}, set ${key.set}`);
    }
    return cards;
  }

  allCards(): Card[] {
    return [...this.groups.values()].flat();
  }

  // ─── Mutations ───────────────────────────────────────────────────

  /**
   * Moves one card between zones, narrowing identities and opponent
   * knowledge along the way.
   * @returns The card that moved.
   */
  move(action: Action): Card {
    const group =
      action.card.kind === "named"
        ? this.db.groupOf(action.card.name)
        : action.card.group;

    const card = this.takeFromSource(action, group);
    this.cardsAt(action.dest, action.destPlayer, group).push(card);

    const knewBefore = card.opponentKnowsExact;
    this.updateOpponentKnowledge(card, action);
    if (!knewBefore && card.opponentKnowsExact) {
      this.propagate(group);
    }
    return card;
  }

  /**
   * A player showed their hand: every listed card is identified and
   * made public at once. Cards are matched to names first and groups
   * are propagated afterwards, so the outcome does not depend on the
   * order of `names`.
   */
  revealHand(player: string, names: readonly string[]): void {
    const hand = this.playerZones(player).hand;
    const assignment = matchNamesToCards(hand, names, player);

    const touched = new Map<string, GroupKey>();
    for (const [card, name] of assignment) {
      card.resolve(name);
      card.markPublic();
      touched.set(groupKeyId(card.group), card.group);
    }
    for (const key of touched.values()) {
      this.propagate(key);
    }
  }

  // ─── Internals ───────────────────────────────────────────────────

  private takeFromSource(action: Action, group: GroupKey): Card {
    const sourceCards = this.cardsAt(action.source, action.sourcePlayer, group);
    const card = this.locateSourceCard(sourceCards, action, group);

    if (action.card.kind === "named" && card.resolvedName !== action.card.name) {
      if (!card.candidates.has(action.card.name)) {
        throw new InconsistentSourceError(
          `Card taken from ${action.source} cannot be "${action.card.name}"`,
          0
        );
      }
      card.resolve(action.card.name);
      this.propagate(group);
    }

    sourceCards.splice(sourceCards.indexOf(card), 1);

    if (action.card.kind === "hidden" && PRIVATE_LOCATIONS.includes(action.source)) {
      this.mergeCandidates(card, sourceCards);
    }
    this.mergeSuspects(card, sourceCards, action);

    return card;
  }

  private locateSourceCard(
    sourceCards: readonly Card[],
    action: Action,
    group: GroupKey
  ): Card {
    if (action.source === "deck") {
      const [top] = sourceCards;
      if (!top) throw new EmptyDrawStackError(group);
      return top;
    }

    const where = `${action.sourcePlayer ?? "?"}'s ${action.source}`;

    if (action.card.kind === "hidden") {
      const card = sourceCards.find((c) => sameGroup(c.group, group));
      if (!card) {
        throw new InconsistentSourceError(
          `No age ${group.age}, set ${group.set} card in ${where}`,
          0
        );
      }
      return card;
    }

    const name = action.card.name;
    const matches = sourceCards.filter((c) => c.candidates.has(name));
    const [first] = matches;
    if (!first) {
      throw new InconsistentSourceError(`No card in ${where} can be "${name}"`, 0);
    }
    // Several matches are only acceptable when nothing tells them apart.
    if (matches.some((c) => !sameCandidates(c, first))) {
      throw new InconsistentSourceError(
        `${matches.length} distinguishable cards in ${where} could be "${name}"`,
        matches.length
      );
    }
    return first;
  }

  /**
   * An anonymous card left a private zone: the observer cannot tell it
   * from its same-group neighbours, so all of them share one candidate
   * set from now on.
   */
  private mergeCandidates(card: Card, remainingSource: readonly Card[]): void {
    const affected = [card, ...remainingSource.filter((c) => sameGroup(c.group, card.group))];
    if (affected.length <= 1) return;

    const union = new Set<string>();
    for (const c of affected) {
      for (const name of c.candidates) union.add(name);
    }
    for (const c of affected) c.replaceCandidates(union);
  }

  /**
   * One of our cards left a private zone without the opponent seeing
   * which: the opponent can no longer tell it from its same-group
   * neighbours, so their suspect lists merge and certainty is lost.
   */
  private mergeSuspects(card: Card, remainingSource: readonly Card[], action: Action): void {
    const hiddenFromOpponent =
      PRIVATE_LOCATIONS.includes(action.source) &&
      (action.dest === "deck" || PRIVATE_LOCATIONS.includes(action.dest)) &&
      action.sourcePlayer === this.perspective &&
      (action.destPlayer === null || action.destPlayer === this.perspective);
    if (!hiddenFromOpponent) return;

    const affected = [card, ...remainingSource.filter((c) => sameGroup(c.group, card.group))];
    if (affected.length === 1) return;

    const suspects = new Set<string>();
    for (const c of affected) {
      for (const name of c.opponentMightSuspect) suspects.add(name);
    }
    // A closed list merged with an open one is still growing.
    const allExplicit = affected.every((c) => c.suspectListExplicit);

    for (const c of affected) {
      c.opponentKnowsExact = false;
      c.opponentMightSuspect = new Set(suspects);
      c.suspectListExplicit = allExplicit;
    }
  }

  private updateOpponentKnowledge(card: Card, action: Action): void {
    const crossesPlayers =
      action.sourcePlayer !== null &&
      action.destPlayer !== null &&
      action.sourcePlayer !== action.destPlayer;

    if (PUBLIC_LOCATIONS.includes(action.dest) || crossesPlayers) {
      if (card.isResolved) {
        card.markPublic();
      } else {
        // Both parties of an exchange see the card even when we do not.
        card.opponentKnowsExact = true;
      }
      return;
    }

    if (PRIVATE_LOCATIONS.includes(action.dest) && action.destPlayer !== this.perspective) {
      card.opponentKnowsExact = true;
    }
  }

  private propagate(key: GroupKey): void {
    if (propagateGroup(this.groupCards(key))) {
      this.logger.debug(`propagated age ${key.age}, set ${key.set}`);
    }
  }

  private takeFromBottom(key: GroupKey): Card {
    const card = this.deckFor(key).pop();
    if (!card) throw new EmptyDrawStackError(key);
    return card;
  }

  private cardsAt(location: LocationKind, player: string | null, key: GroupKey): Card[] {
    if (location === "deck") return this.deckFor(key);
    if (player === null) {
      throw new TrackerError(`Location "${location}" needs an owning player`);
    }
    return this.playerZones(player)[location];
  }

  private deckFor(key: GroupKey): Card[] {
    const deck = this.decks.get(groupKeyId(key));
    if (!deck) {
      throw new TrackerError(`No draw stack for age ${key.age}, set ${key.set}`);
    }
    return deck;
  }

  private playerZones(player: string): PlayerZones {
    const zones = this.zones.get(player);
    if (!zones) {
      throw new RangeError(`Player not found: ${player}`);
    }
    return zones;
  }
}

// ─── Helpers ───────────────────────────────────────────────────────

function sameCandidates(a: Card, b: Card): boolean {
  if (a.candidates.size !== b.candidates.size) return false;
  for (const name of a.candidates) {
    if (!b.candidates.has(name)) return false;
  }
  return true;
}

/**
 * Pairs each revealed name with a distinct card of the hand that can
 * still be that name (augmenting-path bipartite matching).
 *
 * @throws {InconsistentSourceError} if no complete pairing exists.
 */
function matchNamesToCards(
  hand: readonly Card[],
  names: readonly string[],
  player: string
): Map<Card, string> {
  if (new Set(names).size !== names.length) {
    throw new InconsistentSourceError(
      `${player}'s hand reveal lists a card more than once`,
      names.length
    );
  }

  const owner = new Map<Card, string>();

  const assign = (name: string, visited: Set<Card>): boolean => {
    const free = hand.find((card) => !owner.has(card) && card.candidates.has(name));
    if (free) {
      owner.set(free, name);
      return true;
    }
    for (const card of hand) {
      if (visited.has(card) || !card.candidates.has(name)) continue;
      visited.add(card);
      const current = owner.get(card);
      if (current !== undefined && assign(current, visited)) {
        owner.set(card, name);
        return true;
      }
    }
    return false;
  };

  // A fixed name order makes the pairing independent of the log's order.
  for (const name of [...names].sort()) {
    if (!assign(name, new Set())) {
      throw new InconsistentSourceError(
        `No card left in ${player}'s hand can be "${name}"`,
        0
      );
    }
  }
  return owner;
}
