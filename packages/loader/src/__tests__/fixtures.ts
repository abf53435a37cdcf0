// ─── Test Fixtures ─────────────────────────────────────────────────
// Raw card info rows and game logs as they would sit on disk.

/**
 * Six base age-1 cards, one base card for each age 2–9 ("Card 2" …
 * "Card 9"), and a special achievement row the database drops.
 */
export function makeRawCardInfo(): unknown[] {
  const rows: unknown[] = [
    { name: "Archery", age: 1, color: "red", set: 0 },
    { name: "Oars", age: 1, color: "red", set: 0 },
    { name: "Clothing", age: 1, color: "green", set: 0 },
    { name: "Pottery", age: 1, color: "blue", set: 0 },
    { name: "Tools", age: 1, color: "blue", set: 0 },
    { name: "Sailing", age: 1, color: "green", set: 0 },
    { name: "Monument", age: null, color: null, set: 0 },
  ];
  for (let age = 2; age <= 9; age++) {
    rows.push({ name: `Card ${age}`, age, color: "blue", set: 0 });
  }
  return rows;
}

/** The one age-1 card left after the deal goes to Me's board. */
export function makeRawGameLog(): unknown {
  return {
    players: { "11": "Me", "22": "Opponent" },
    log: [
      { type: "message", move: 1, msg: "Me melds a card" },
      {
        type: "transfer",
        move: 2,
        cardSet: "base",
        source: "deck",
        dest: "board",
        cardName: "Sailing",
        cardAge: 1,
        destOwner: "Me",
      },
    ],
  };
}
