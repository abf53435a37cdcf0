// ─── Card Database ─────────────────────────────────────────────────
// Static metadata for every tracked card, indexed by lowercase name.
// Groups the identity names by (age, set) for the game state store.

import type { CardDefinition, GroupKey } from "../types/index";
import { safeParseCardDatabase, toIndexName } from "@innovation-tracker/schema";
import { formatIssues, TrackerParseError, UnknownCardError } from "../engine/errors";
import { compareGroupKeys, groupKeyId } from "../engine/group-key";

export { toIndexName } from "@innovation-tracker/schema";

/** Board colour order used for display sorting: blue, red, green, yellow, purple. */
const COLOR_ORDER: Readonly<Record<string, number>> = {
  blue: 0,
  red: 1,
  green: 2,
  yellow: 3,
  purple: 4,
};

const UNKNOWN_COLOR_RANK = 99;

/** A database entry with its lookup key attached. */
export interface CardInfo extends CardDefinition {
  /** Lowercase `name`; the identity used throughout the engine. */
  readonly indexName: string;
}

/** Sort key: age, then colour, then name. */
export type CardSortKey = readonly [number, number, string];

export class CardDatabase {
  private readonly byName: ReadonlyMap<string, CardInfo>;
  private readonly groups: ReadonlyMap<string, { key: GroupKey; names: readonly string[] }>;

  constructor(definitions: readonly CardDefinition[]) {
    const byName = new Map<string, CardInfo>();
    const groups = new Map<string, { key: GroupKey; names: string[] }>();

    for (const def of definitions) {
      const indexName = toIndexName(def.name);
      if (byName.has(indexName)) {
        throw new TrackerParseError(`Duplicate card name: "${def.name}"`, [
          `${def.name}: duplicates an earlier card once normalized`,
        ]);
      }
      byName.set(indexName, { ...def, indexName });

      const key: GroupKey = { age: def.age, set: def.set };
      const id = groupKeyId(key);
      const group = groups.get(id);
      if (group) {
        group.names.push(indexName);
      } else {
        groups.set(id, { key, names: [indexName] });
      }
    }

    this.byName = byName;
    this.groups = groups;
  }

  /**
   * Builds a database from the raw card list (as found in the platform's
   * card info file). Rows outside the tracked sets are skipped.
   *
   * @throws {TrackerParseError} if a tracked row is malformed.
   */
  static fromRaw(raw: unknown): CardDatabase {
    const result = safeParseCardDatabase(raw);
    if (!result.success) {
      const issues = formatIssues(result.error.issues);
      throw new TrackerParseError(
        `Invalid card database: ${issues.length} issue(s)`,
        issues
      );
    }
    return new CardDatabase(result.data);
  }

  get size(): number {
    return this.byName.size;
  }

  has(indexName: string): boolean {
    return this.byName.has(indexName);
  }

  /** @throws {UnknownCardError} for a name not in the database. */
  get(indexName: string): CardInfo {
    const info = this.byName.get(indexName);
    if (!info) {
      throw new UnknownCardError(indexName);
    }
    return info;
  }

  groupOf(indexName: string): GroupKey {
    const info = this.get(indexName);
    return { age: info.age, set: info.set };
  }

  displayName(indexName: string): string {
    return this.get(indexName).name;
  }

  sortKey(indexName: string): CardSortKey {
    const info = this.get(indexName);
    return [info.age, COLOR_ORDER[info.color] ?? UNKNOWN_COLOR_RANK, indexName];
  }

  /** Index names of one identity group, in database order. */
  namesForGroup(key: GroupKey): readonly string[] {
    return this.groups.get(groupKeyId(key))?.names ?? [];
  }

  /** Every group present in the database, ordered by age then set. */
  groupKeys(): GroupKey[] {
    return [...this.groups.values()]
      .map((g) => g.key)
      .sort(compareGroupKeys);
  }
}

/** Compares two sort keys lexicographically. */
export function compareSortKeys(a: CardSortKey, b: CardSortKey): number {
  if (a[0] !== b[0]) return a[0] - b[0];
  if (a[1] !== b[1]) return a[1] - b[1];
  if (a[2] === b[2]) return 0;
  return a[2] < b[2] ? -1 : 1;
}
