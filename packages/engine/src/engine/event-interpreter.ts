// ─── Event Interpreter ─────────────────────────────────────────────
// Classifies one normalized log event into a single store command.
// Anything that cannot be classified is fatal: a move the store never
// sees would silently corrupt every later deduction.

import type {
  GameLogEvent,
  HandRevealEvent,
  LocationKind,
  TransferEvent,
} from "../types/index";
import { LABEL_TO_SET, LOCATION_KINDS, PUBLIC_LOCATIONS } from "../types/index";
import { toIndexName, type CardDatabase } from "../cards/card-database";
import { UnrecognizedEventError } from "./errors";
import type { Action, CardRef, GameState } from "./game-state";

// ─── Commands ──────────────────────────────────────────────────────

export type TrackerCommand =
  | { readonly kind: "move"; readonly action: Action }
  | {
      readonly kind: "revealHand";
      readonly player: string;
      readonly names: readonly string[];
    }
  | { readonly kind: "ignore"; readonly reason: string };

export interface InterpretContext {
  readonly db: CardDatabase;
  readonly players: readonly string[];
}

/**
 * Destinations of achievement claims. The store does not track them:
 * which card became an achievement is deduced from the cards never
 * accounted for.
 */
const ACHIEVEMENT_DESTINATIONS: readonly string[] = ["achievements", "claimed"];

// ─── interpretEvent ────────────────────────────────────────────────

/**
 * Turns one event into the command the store should run.
 * @throws {UnrecognizedEventError} for events that fit no known shape.
 * @throws {UnknownCardError} for card names missing from the database.
 */
export function interpretEvent(
  event: GameLogEvent,
  ctx: InterpretContext
): TrackerCommand {
  switch (event.type) {
    case "transfer":
      return interpretTransfer(event, ctx);
    case "handReveal":
      return interpretHandReveal(event, ctx);
    case "message":
      return { kind: "ignore", reason: "log message" };
  }
}

/**
 * Interprets one event and applies it to the store.
 * @returns The command that was applied.
 */
export function applyEvent(state: GameState, event: GameLogEvent): TrackerCommand {
  const command = interpretEvent(event, { db: state.db, players: state.players });
  switch (command.kind) {
    case "move":
      state.move(command.action);
      break;
    case "revealHand":
      state.revealHand(command.player, command.names);
      break;
    case "ignore":
      break;
  }
  return command;
}

/** One-line description of a command, for debug logs. */
export function describeCommand(command: TrackerCommand): string {
  switch (command.kind) {
    case "move": {
      const { action } = command;
      const card =
        action.card.kind === "named"
          ? action.card.name
          : `[age ${action.card.group.age}, set ${action.card.group.set}]`;
      const from = action.sourcePlayer ? `${action.sourcePlayer}'s ${action.source}` : action.source;
      const to = action.destPlayer ? `${action.destPlayer}'s ${action.dest}` : action.dest;
      return `move ${card}: ${from} -> ${to}`;
    }
    case "revealHand":
      return `${command.player} reveals ${command.names.join(", ")}`;
    case "ignore":
      return `ignored (${command.reason})`;
  }
}

// ─── Transfers ─────────────────────────────────────────────────────

function interpretTransfer(event: TransferEvent, ctx: InterpretContext): TrackerCommand {
  if (ACHIEVEMENT_DESTINATIONS.includes(event.dest)) {
    return { kind: "ignore", reason: "achievement claim" };
  }

  const source = toLocation(event.source, event, "source");
  const dest = toLocation(event.dest, event, "destination");
  const sourcePlayer = ownerOf(source, event.sourceOwner, event, ctx, "source");
  const destPlayer = ownerOf(dest, event.destOwner, event, ctx, "destination");
  const card = cardRefOf(event, ctx);

  if (card.kind === "hidden") {
    if (PUBLIC_LOCATIONS.includes(dest)) {
      throw unrecognized(event, `unnamed card moved into public ${dest}`);
    }
    if (source === "board") {
      throw unrecognized(event, "unnamed card moved off a board");
    }
  }

  return {
    kind: "move",
    action: { source, sourcePlayer, dest, destPlayer, card },
  };
}

function toLocation(value: string, event: TransferEvent, role: string): LocationKind {
  const location = LOCATION_KINDS.find((kind) => kind === value);
  if (!location) {
    throw unrecognized(event, `unknown ${role} location "${value}"`);
  }
  return location;
}

/** Draw stacks are shared; every other location needs a rostered owner. */
function ownerOf(
  location: LocationKind,
  owner: string | null,
  event: TransferEvent,
  ctx: InterpretContext,
  role: string
): string | null {
  if (location === "deck") return null;
  if (owner === null) {
    throw unrecognized(event, `${role} ${location} has no owner`);
  }
  if (!ctx.players.includes(owner)) {
    throw unrecognized(event, `${role} owner "${owner}" is not a player`);
  }
  return owner;
}

function cardRefOf(event: TransferEvent, ctx: InterpretContext): CardRef {
  const set = LABEL_TO_SET[event.cardSet];

  if (event.cardName !== null) {
    const info = ctx.db.get(toIndexName(event.cardName));
    if (info.set !== set) {
      throw unrecognized(event, `"${info.name}" is not a ${event.cardSet} card`);
    }
    if (event.cardAge !== null && event.cardAge !== info.age) {
      throw unrecognized(event, `"${info.name}" is age ${info.age}, not ${event.cardAge}`);
    }
    return { kind: "named", name: info.indexName };
  }

  if (event.cardAge === null) {
    throw unrecognized(event, "neither card name nor age");
  }
  return { kind: "hidden", group: { age: event.cardAge, set } };
}

// ─── Hand Reveals ──────────────────────────────────────────────────

function interpretHandReveal(event: HandRevealEvent, ctx: InterpretContext): TrackerCommand {
  if (!ctx.players.includes(event.player)) {
    throw new UnrecognizedEventError(
      `Unrecognized hand reveal at move ${event.move}: "${event.player}" is not a player`,
      event
    );
  }
  return {
    kind: "revealHand",
    player: event.player,
    names: event.cards.map((name) => ctx.db.get(toIndexName(name)).indexName),
  };
}

function unrecognized(event: TransferEvent, reason: string): UnrecognizedEventError {
  return new UnrecognizedEventError(
    `Unrecognized transfer at move ${event.move}: ${reason} (${JSON.stringify(event)})`,
    event
  );
}
