// ─── Normalized Game Log ───────────────────────────────────────────
// The event stream handed over by the log-normalization stage.
// Each entry is a discriminated union on `type`.

import type { SetLabel } from "./card";

/**
 * A card moved between two locations. Either `cardName` is set (the
 * observer saw which card moved) or `cardAge` is (only the age and set
 * were visible). Locations stay plain strings here: classifying them is
 * the interpreter's job, so an unexpected value fails there with the
 * offending event attached.
 */
export interface TransferEvent {
  readonly type: "transfer";
  readonly move: number;
  readonly cardSet: SetLabel;
  readonly source: string;
  readonly dest: string;
  readonly cardName: string | null;
  readonly cardAge: number | null;
  readonly sourceOwner: string | null;
  readonly destOwner: string | null;
}

/** A player showed their whole hand at once. */
export interface HandRevealEvent {
  readonly type: "handReveal";
  readonly move: number;
  readonly player: string;
  readonly cards: readonly string[];
}

/** A plain log line with no card movement attached. */
export interface MessageEvent {
  readonly type: "message";
  readonly move: number;
  readonly msg: string;
}

export type GameLogEvent = TransferEvent | HandRevealEvent | MessageEvent;

/** A complete normalized log for one table. */
export interface GameLog {
  /** Platform player id → display name. */
  readonly players: Readonly<Record<string, string>>;
  readonly log: readonly GameLogEvent[];
}
