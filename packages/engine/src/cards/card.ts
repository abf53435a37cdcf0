// ─── Card Identity Model ───────────────────────────────────────────
// One physical card whose identity may not be known yet, plus what the
// opponent can infer about it. Age and set are always known from the
// draw context; the identity narrows as the game reveals it.

import type { CardSet, GroupKey } from "../types/index";
import { ContradictionError } from "../engine/errors";

export class Card {
  readonly age: number;
  readonly set: CardSet;

  /** Possible identity names (lowercase). Size 1 means resolved. */
  private _candidates: Set<string>;

  /** The opponent can name this card with certainty. */
  opponentKnowsExact = false;

  /**
   * Names the opponent could associate with this card. Empty means no
   * information has accumulated yet, not "none of these".
   */
  opponentMightSuspect = new Set<string>();

  /** `opponentMightSuspect` is closed rather than a growing lower bound. */
  suspectListExplicit = false;

  constructor(age: number, set: CardSet, candidates: Iterable<string>) {
    this.age = age;
    this.set = set;
    this._candidates = new Set(candidates);
    if (this._candidates.size === 0) {
      throw new ContradictionError(
        `Card of age ${age}, set ${set} created with no candidates`
      );
    }
  }

  get group(): GroupKey {
    return { age: this.age, set: this.set };
  }

  get candidates(): ReadonlySet<string> {
    return this._candidates;
  }

  get isResolved(): boolean {
    return this._candidates.size === 1;
  }

  /** The identity name once resolved, otherwise `null`. */
  get resolvedName(): string | null {
    if (!this.isResolved) return null;
    const [name] = this._candidates;
    return name ?? null;
  }

  /** Collapses the candidates to a single known identity. */
  resolve(name: string): void {
    this._candidates = new Set([name]);
  }

  /**
   * Removes names from the candidates.
   * @returns Whether the candidate set changed.
   * @throws {ContradictionError} if no candidate would remain.
   */
  removeCandidates(names: Iterable<string>): boolean {
    const remaining = new Set(this._candidates);
    for (const name of names) remaining.delete(name);
    if (remaining.size === this._candidates.size) return false;
    if (remaining.size === 0) {
      throw new ContradictionError(
        `Removing candidates would leave a card of age ${this.age}, set ${this.set} with no identity`
      );
    }
    this._candidates = remaining;
    return true;
  }

  /**
   * Overwrites the candidates wholesale. Only the ambiguity merge uses
   * this: it is the one operation allowed to widen a candidate set.
   */
  replaceCandidates(names: Iterable<string>): void {
    const next = new Set(names);
    if (next.size === 0) {
      throw new ContradictionError("Candidate set cannot be empty");
    }
    this._candidates = next;
  }

  /** The card's identity became known to everyone. */
  markPublic(): void {
    const name = this.resolvedName;
    if (name === null) {
      throw new ContradictionError(
        `Cannot make an unresolved card of age ${this.age}, set ${this.set} public`
      );
    }
    this.opponentKnowsExact = true;
    this.opponentMightSuspect = new Set([name]);
    this.suspectListExplicit = true;
  }

  toString(): string {
    const name = this.resolvedName;
    if (name !== null) {
      return `Card(${name}, age=${this.age}, set=${this.set}${this.opponentKnowsExact ? ", opp_knows" : ""})`;
    }
    return `Card(age=${this.age}, set=${this.set}, ${this._candidates.size} candidates)`;
  }
}
