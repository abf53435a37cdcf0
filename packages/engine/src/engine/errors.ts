// ─── Tracker Errors ────────────────────────────────────────────────
// Every anomaly in the event stream invalidates the reconstruction, so
// none of these are recoverable: they propagate to the caller and abort
// the run.

import type { GroupKey } from "../types/index";

/** Base class for all tracker failures. */
export class TrackerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrackerError";
  }
}

/** The interpreter could not classify a log event. */
export class UnrecognizedEventError extends TrackerError {
  constructor(
    message: string,
    public readonly event: unknown
  ) {
    super(message);
    this.name = "UnrecognizedEventError";
  }
}

/**
 * A named move's source zone holds no card that could be the named
 * identity, or several distinguishable ones.
 */
export class InconsistentSourceError extends TrackerError {
  constructor(
    message: string,
    public readonly matches: number
  ) {
    super(message);
    this.name = "InconsistentSourceError";
  }
}

/** A draw was logged from a draw stack with no cards left. */
export class EmptyDrawStackError extends TrackerError {
  constructor(public readonly group: GroupKey) {
    super(`Draw stack for age ${group.age}, set ${group.set} is empty`);
    this.name = "EmptyDrawStackError";
  }
}

/** A card name that is not in the card database. */
export class UnknownCardError extends TrackerError {
  constructor(public readonly cardName: string) {
    super(`Unknown card: "${cardName}"`);
    this.name = "UnknownCardError";
  }
}

/**
 * A card was pushed into an impossible state: an empty candidate set,
 * or public knowledge of an identity that is not yet resolved.
 */
export class ContradictionError extends TrackerError {
  constructor(message: string) {
    super(message);
    this.name = "ContradictionError";
  }
}

/** Raw input failed schema validation. */
export class TrackerParseError extends TrackerError {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "TrackerParseError";
  }
}

/** Minimal shape of a Zod issue (path + message). */
interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/** Renders Zod issues as `path: message` lines; `(root)` for an empty path. */
export function formatIssues(issues: readonly ZodIssueLike[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
