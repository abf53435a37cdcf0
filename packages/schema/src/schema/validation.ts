// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for the tracker's inputs and outputs. Raw JSON goes in,
// typed data comes out; nothing downstream re-checks these shapes.

import { z } from "zod";
import { CardSet, MAX_AGE, MIN_AGE, toIndexName } from "../types/card";

// ─── Primitives ────────────────────────────────────────────────────

const CardSetSchema = z.union([
  z.literal(CardSet.BASE),
  z.literal(CardSet.CITIES),
]);

const SetLabelSchema = z.enum(["base", "cities"]);

const AgeSchema = z.number().int().min(MIN_AGE).max(MAX_AGE);

const MoveNumberSchema = z.number().int().min(0);

// ─── Card Database ─────────────────────────────────────────────────

const CardDefinitionSchema = z.object({
  name: z.string().min(1),
  age: AgeSchema,
  color: z.string().min(1),
  set: CardSetSchema,
});

/**
 * Raw database rows. The platform's card list also carries special
 * achievements, relics and other expansions; those rows have no age,
 * no colour or a set code the tracker does not model, and are dropped.
 */
const RawCardEntrySchema = z
  .object({
    name: z.string().optional(),
    age: z.number().nullable().optional(),
    color: z.string().nullable().optional(),
    set: z.number().nullable().optional(),
  })
  .passthrough()
  .nullable();

function isTrackedEntry(entry: z.infer<typeof RawCardEntrySchema>): boolean {
  if (entry === null) return false;
  if (entry.age === null || entry.age === undefined) return false;
  if (entry.color === null || entry.color === undefined) return false;
  return entry.set === CardSet.BASE || entry.set === CardSet.CITIES;
}

export const CardDatabaseSchema = z
  .array(RawCardEntrySchema)
  .transform((entries) => entries.filter(isTrackedEntry))
  .pipe(z.array(CardDefinitionSchema))
  .refine(
    (cards) => new Set(cards.map((c) => toIndexName(c.name))).size === cards.length,
    { message: "card names must be unique once normalized" }
  );

export type ParsedCardDatabase = z.infer<typeof CardDatabaseSchema>;

// ─── Game Log ──────────────────────────────────────────────────────

const TransferEventSchema = z.object({
  type: z.literal("transfer"),
  move: MoveNumberSchema,
  cardSet: SetLabelSchema,
  source: z.string().min(1),
  dest: z.string().min(1),
  cardName: z.string().min(1).nullable().default(null),
  cardAge: AgeSchema.nullable().default(null),
  sourceOwner: z.string().min(1).nullable().default(null),
  destOwner: z.string().min(1).nullable().default(null),
});

const HandRevealEventSchema = z.object({
  type: z.literal("handReveal"),
  move: MoveNumberSchema,
  player: z.string().min(1),
  cards: z.array(z.string().min(1)).min(1),
});

const MessageEventSchema = z.object({
  type: z.literal("message"),
  move: MoveNumberSchema,
  msg: z.string(),
});

export const GameLogEventSchema = z.discriminatedUnion("type", [
  TransferEventSchema,
  HandRevealEventSchema,
  MessageEventSchema,
]);

export const GameLogSchema = z.object({
  players: z.record(z.string(), z.string()).default({}),
  log: z.array(GameLogEventSchema),
});

export type ParsedGameLog = z.infer<typeof GameLogSchema>;

// ─── Tracker Config ────────────────────────────────────────────────

export const TrackerConfigSchema = z
  .object({
    perspective: z.string().min(1),
    players: z.array(z.string().min(1)).min(2),
    logLevel: z.enum(["debug", "info", "warn", "silent"]).default("warn"),
  })
  .refine((c) => new Set(c.players).size === c.players.length, {
    message: "player names must be unique",
    path: ["players"],
  })
  .refine((c) => c.players.includes(c.perspective), {
    message: "perspective must be one of the players",
    path: ["perspective"],
  });

export type ParsedTrackerConfig = z.infer<typeof TrackerConfigSchema>;

// ─── Snapshot ──────────────────────────────────────────────────────

const SnapshotCardSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("known"), name: z.string().min(1), revealed: z.boolean() }),
  z.object({ kind: z.literal("unknown"), age: AgeSchema, set: CardSetSchema }),
]);

const SnapshotDeckSchema = z.object({
  base: z.array(z.string().min(1).nullable()),
  cities: z.array(z.string().min(1).nullable()),
});

export const GameSnapshotSchema = z.object({
  perspective: z.string().min(1),
  players: z.array(z.string().min(1)),
  hands: z.record(z.string(), z.array(SnapshotCardSchema)),
  scores: z.record(z.string(), z.array(SnapshotCardSchema)),
  boards: z.record(z.string(), z.array(z.string().min(1))),
  decks: z.record(z.string(), SnapshotDeckSchema),
  achievements: z.array(z.string().min(1).nullable()).length(9),
});

export type ParsedGameSnapshot = z.infer<typeof GameSnapshotSchema>;

// ─── Parse Helpers ─────────────────────────────────────────────────

/**
 * Parses a raw card list into the tracked card definitions.
 * Throws a ZodError with detailed issues on malformed rows.
 */
export function parseCardDatabase(raw: unknown): ParsedCardDatabase {
  return CardDatabaseSchema.parse(raw);
}

export function safeParseCardDatabase(
  raw: unknown
): ReturnType<typeof CardDatabaseSchema.safeParse> {
  return CardDatabaseSchema.safeParse(raw);
}

/** Parses a normalized game log, filling defaults for absent fields. */
export function parseGameLog(raw: unknown): ParsedGameLog {
  return GameLogSchema.parse(raw);
}

export function safeParseGameLog(
  raw: unknown
): ReturnType<typeof GameLogSchema.safeParse> {
  return GameLogSchema.safeParse(raw);
}

export function parseTrackerConfig(raw: unknown): ParsedTrackerConfig {
  return TrackerConfigSchema.parse(raw);
}

export function safeParseTrackerConfig(
  raw: unknown
): ReturnType<typeof TrackerConfigSchema.safeParse> {
  return TrackerConfigSchema.safeParse(raw);
}

export function safeParseGameSnapshot(
  raw: unknown
): ReturnType<typeof GameSnapshotSchema.safeParse> {
  return GameSnapshotSchema.safeParse(raw);
}
