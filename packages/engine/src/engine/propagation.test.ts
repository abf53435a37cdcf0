import { describe, it, expect } from "vitest";
import {
  combinations,
  eliminateNakedSubsets,
  eliminateSingletons,
  eliminateSuspects,
  propagateGroup,
  resolveHiddenSingles,
} from "./propagation";
import type { Card } from "../cards/card";
import {
  candidatesOf,
  hasBijection,
  makeCard,
  seededRandom,
  suspectsOf,
} from "../__tests__/fixtures";

// ─── Tests ─────────────────────────────────────────────────────────

describe("propagation", () => {
  // ══════════════════════════════════════════════════════════════════
  // ── Individual rules ─────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("eliminateSingletons", () => {
    it("removes a resolved name from every other card", () => {
      const a = makeCard(["x"]);
      const b = makeCard(["x", "y", "z"]);
      const c = makeCard(["y", "z"]);

      expect(eliminateSingletons([a, b, c])).toBe(true);
      expect(candidatesOf(b)).toEqual(["y", "z"]);
      expect(candidatesOf(c)).toEqual(["y", "z"]);
      expect(eliminateSingletons([a, b, c])).toBe(false);
    });
  });

  describe("resolveHiddenSingles", () => {
    it("resolves the only unresolved card that can hold a name", () => {
      const a = makeCard(["x", "y", "z"]);
      const b = makeCard(["y", "z"]);
      const c = makeCard(["y", "z"]);

      expect(resolveHiddenSingles([a, b, c])).toBe(true);
      expect(a.resolvedName).toBe("x");
      expect(b.isResolved).toBe(false);
    });

    it("ignores names held by resolved cards", () => {
      const a = makeCard(["x"]);
      const b = makeCard(["y", "z"]);
      const c = makeCard(["y", "z"]);
      expect(resolveHiddenSingles([a, b, c])).toBe(false);
    });

    it("skips a name a resolved card still leaves in other candidate sets", () => {
      const a = makeCard(["x"]);
      const b = makeCard(["x", "z"]);

      expect(resolveHiddenSingles([a, b])).toBe(true);
      expect(b.resolvedName).toBe("z");
    });
  });

  describe("eliminateNakedSubsets", () => {
    it("removes a naked pair from the other unresolved cards", () => {
      const a = makeCard(["x", "y"]);
      const b = makeCard(["x", "y"]);
      const c = makeCard(["x", "z", "w"]);
      const d = makeCard(["y", "z", "w", "v"]);
      const e = makeCard(["z", "w", "v"]);

      expect(eliminateNakedSubsets([a, b, c, d, e])).toBe(true);
      expect(candidatesOf(a)).toEqual(["x", "y"]);
      expect(candidatesOf(b)).toEqual(["x", "y"]);
      expect(candidatesOf(c)).toEqual(["w", "z"]);
      expect(candidatesOf(d)).toEqual(["v", "w", "z"]);
      expect(candidatesOf(e)).toEqual(["v", "w", "z"]);
    });

    it("finds a naked triple, then the pair it exposes", () => {
      const a = makeCard(["x", "y"]);
      const b = makeCard(["y", "z"]);
      const c = makeCard(["x", "z"]);
      const d = makeCard(["x", "y", "z", "w", "v"]);
      const e = makeCard(["w", "v", "x"]);

      expect(eliminateNakedSubsets([a, b, c, d, e])).toBe(true);
      expect(candidatesOf(d)).toEqual(["v", "w"]);
      expect(candidatesOf(e)).toEqual(["v", "w"]);
      expect(candidatesOf(a)).toEqual(["x", "y"]);
    });

    it("does nothing with three or fewer unresolved cards", () => {
      const a = makeCard(["x", "y"]);
      const b = makeCard(["x", "y"]);
      const c = makeCard(["x", "y", "z"]);

      expect(eliminateNakedSubsets([a, b, c])).toBe(false);
      expect(candidatesOf(c)).toEqual(["x", "y", "z"]);
    });
  });

  describe("eliminateSuspects", () => {
    it("strikes a name the opponent knows from other suspect lists", () => {
      const paper = makeCard(["paper"], { knows: true });
      const closed = makeCard(["compass", "alchemy"], {
        suspect: ["paper", "compass"],
        explicit: true,
      });
      const open = makeCard(["compass", "alchemy"], {
        suspect: ["paper", "alchemy", "compass"],
      });

      expect(eliminateSuspects([paper, closed, open])).toBe(true);
      expect(suspectsOf(closed)).toEqual(["compass"]);
      expect(closed.opponentKnowsExact).toBe(true);
      expect(suspectsOf(open)).toEqual(["alchemy", "compass"]);
      expect(open.opponentKnowsExact).toBe(false);
    });

    it("ignores resolved cards the opponent cannot name", () => {
      const paper = makeCard(["paper"]);
      const other = makeCard(["compass", "alchemy"], { suspect: ["paper", "compass"] });

      expect(eliminateSuspects([paper, other])).toBe(false);
      expect(suspectsOf(other)).toEqual(["compass", "paper"]);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── propagateGroup ───────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("propagateGroup", () => {
    it("resolves the partner of a card identified by name", () => {
      const a = makeCard(["x", "y"]);
      const b = makeCard(["x", "y"]);
      a.resolve("x");

      expect(propagateGroup([a, b])).toBe(true);
      expect(b.resolvedName).toBe("y");
    });

    it("narrows a wide card past a naked pair", () => {
      const group = [
        makeCard(["x", "y"]),
        makeCard(["x", "y"]),
        makeCard(["x", "z", "w"]),
        makeCard(["y", "z", "w", "v"]),
        makeCard(["z", "w", "v"]),
      ];

      propagateGroup(group);
      const third = group[2];
      expect(third && candidatesOf(third)).toEqual(["w", "z"]);
    });

    it("resolves by hidden single when too few cards are unresolved for subsets", () => {
      const a = makeCard(["x", "y"]);
      const b = makeCard(["x", "y"]);
      const c = makeCard(["x", "y", "z"]);

      expect(propagateGroup([a, b, c])).toBe(true);
      expect(c.resolvedName).toBe("z");
      expect(candidatesOf(a)).toEqual(["x", "y"]);
    });

    it("chains suspect elimination into later certainties", () => {
      const paper = makeCard(["paper"], { knows: true });
      const compass = makeCard(["compass"], {
        suspect: ["paper", "compass"],
        explicit: true,
      });
      const alchemy = makeCard(["alchemy"], {
        suspect: ["compass", "alchemy"],
        explicit: true,
      });

      propagateGroup([paper, compass, alchemy]);
      expect(compass.opponentKnowsExact).toBe(true);
      expect(suspectsOf(alchemy)).toEqual(["alchemy"]);
      expect(alchemy.opponentKnowsExact).toBe(true);
    });

    it("settles a card resolved late in the singleton pass", () => {
      const a = makeCard(["x", "y"]);
      const b = makeCard(["y"]);
      const c = makeCard(["x", "z"]);

      expect(propagateGroup([a, b, c])).toBe(true);
      expect(a.resolvedName).toBe("x");
      expect(c.resolvedName).toBe("z");
    });

    it("reports no change when nothing can be deduced", () => {
      const group = [makeCard(["x", "y"]), makeCard(["x", "y"])];
      expect(propagateGroup(group)).toBe(false);
    });

    it("keeps every true identity and a full assignment on random groups", () => {
      const random = seededRandom(20240601);

      for (let trial = 0; trial < 200; trial++) {
        const size = 2 + Math.floor(random() * 5);
        const names = Array.from({ length: size }, (_, i) => `n${i}`);
        const group: Card[] = names.map((truth) =>
          makeCard([truth, ...names.filter((name) => name !== truth && random() < 0.5)])
        );

        propagateGroup(group);

        group.forEach((card, i) => {
          expect(card.candidates.has(names[i] ?? "")).toBe(true);
        });
        expect(hasBijection(group, names)).toBe(true);
        expect(propagateGroup(group)).toBe(false);
      }
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── combinations ─────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("combinations", () => {
    it("yields subsets in index order", () => {
      expect([...combinations(["a", "b", "c", "d"], 2)]).toEqual([
        ["a", "b"],
        ["a", "c"],
        ["a", "d"],
        ["b", "c"],
        ["b", "d"],
        ["c", "d"],
      ]);
    });

    it("handles the edge sizes", () => {
      expect([...combinations(["a", "b"], 0)]).toEqual([[]]);
      expect([...combinations(["a", "b"], 2)]).toEqual([["a", "b"]]);
      expect([...combinations(["a", "b"], 3)]).toEqual([]);
    });
  });
});
