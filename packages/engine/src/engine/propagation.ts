// ─── Constraint Propagation ────────────────────────────────────────
// Sudoku-style deduction inside one identity group. A group holds one
// physical card per identity name, so the cards' candidate sets must
// always admit a one-to-one assignment onto the group's names. Each
// rule below only removes possibilities that no such assignment uses.

import type { Card } from "../cards/card";

/**
 * Groups never exceed about fifteen cards, which keeps the brute-force
 * subset search affordable. It only pays off with more than three
 * unresolved cards.
 */
const NAKED_SUBSET_MIN_UNRESOLVED = 4;

/**
 * Runs every rule over the group until a full pass changes nothing.
 * @returns Whether any card changed.
 */
export function propagateGroup(group: readonly Card[]): boolean {
  let changedAny = false;
  let changed = true;

  while (changed) {
    changed = false;
    if (eliminateSingletons(group)) changed = true;
    if (resolveHiddenSingles(group)) changed = true;
    if (eliminateNakedSubsets(group)) changed = true;
    if (eliminateSuspects(group)) changed = true;
    if (changed) changedAny = true;
  }

  return changedAny;
}

// ─── Rules ─────────────────────────────────────────────────────────

/** A resolved card's name is removed from every other card. */
export function eliminateSingletons(group: readonly Card[]): boolean {
  let changed = false;
  for (const card of group) {
    const name = card.resolvedName;
    if (name === null) continue;
    for (const other of group) {
      if (other !== card && other.removeCandidates([name])) {
        changed = true;
      }
    }
  }
  return changed;
}

/**
 * A name only one unresolved card can still be must be that card.
 * Names already resolved elsewhere are skipped: a card resolved late in
 * the singleton pass can leave its name behind in other candidate sets.
 */
export function resolveHiddenSingles(group: readonly Card[]): boolean {
  let changed = false;
  const taken = new Set<string>();
  const names = new Set<string>();
  for (const card of group) {
    if (card.resolvedName !== null) {
      taken.add(card.resolvedName);
      continue;
    }
    for (const name of card.candidates) names.add(name);
  }

  for (const name of names) {
    if (taken.has(name)) continue;
    const holders = group.filter(
      (c) => !c.isResolved && c.candidates.has(name)
    );
    const [holder] = holders;
    if (holders.length === 1 && holder) {
      holder.resolve(name);
      changed = true;
    }
  }
  return changed;
}

/**
 * N unresolved cards whose candidates together span exactly N names
 * own those names: remove them from every other unresolved card.
 * The search restarts after any removal so it never runs on stale sets.
 */
export function eliminateNakedSubsets(group: readonly Card[]): boolean {
  let changed = false;
  let restart = true;

  while (restart) {
    restart = false;
    const unresolved = group.filter((c) => !c.isResolved);
    if (unresolved.length < NAKED_SUBSET_MIN_UNRESOLVED) break;

    search: for (let size = 2; size < unresolved.length; size++) {
      for (const subset of combinations(unresolved, size)) {
        const union = candidateUnion(subset);
        if (union.size !== size) continue;

        let removed = false;
        for (const other of unresolved) {
          if (subset.includes(other)) continue;
          if (other.removeCandidates(union)) removed = true;
        }
        if (removed) {
          changed = true;
          restart = true;
          break search;
        }
      }
    }
  }

  return changed;
}

/**
 * Names the opponent knows for certain are struck from the other cards'
 * suspect lists. A closed list narrowed to one name is itself a
 * certainty for the opponent.
 */
export function eliminateSuspects(group: readonly Card[]): boolean {
  let changed = false;
  for (const card of group) {
    const name = card.resolvedName;
    if (name === null || !card.opponentKnowsExact) continue;
    for (const other of group) {
      if (other === card || !other.opponentMightSuspect.delete(name)) continue;
      changed = true;
      if (other.suspectListExplicit && other.opponentMightSuspect.size === 1) {
        other.opponentKnowsExact = true;
      }
    }
  }
  return changed;
}

// ─── Helpers ───────────────────────────────────────────────────────

export function candidateUnion(cards: Iterable<Card>): Set<string> {
  const union = new Set<string>();
  for (const card of cards) {
    for (const name of card.candidates) union.add(name);
  }
  return union;
}

/** All `size`-element subsets of `items`, in lexicographic index order. */
export function* combinations<T>(
  items: readonly T[],
  size: number
): Generator<T[]> {
  if (size > items.length || size < 0) return;
  const indices = Array.from({ length: size }, (_, i) => i);

  while (true) {
    const subset: T[] = [];
    for (const index of indices) {
      const item = items[index];
      if (item !== undefined) subset.push(item);
    }
    yield subset;

    let pos = size - 1;
    while (pos >= 0 && indices[pos] === items.length - size + pos) pos--;
    if (pos < 0) return;
    indices[pos] = (indices[pos] ?? 0) + 1;
    for (let next = pos + 1; next < size; next++) {
      indices[next] = (indices[next - 1] ?? 0) + 1;
    }
  }
}
