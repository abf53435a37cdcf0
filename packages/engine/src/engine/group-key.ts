// ─── Group Keys ────────────────────────────────────────────────────
// Identity groups are keyed by (age, set). Maps need a primitive key,
// so groups are indexed by the encoded form "<age>:<set>".

import type { GroupKey } from "../types/index";

export function groupKeyId(key: GroupKey): string {
  return `${key.age}:${key.set}`;
}

export function sameGroup(a: GroupKey, b: GroupKey): boolean {
  return a.age === b.age && a.set === b.set;
}

/** Orders groups by age, then set code. */
export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  return a.age - b.age || a.set - b.set;
}
