import assert from "node:assert/strict";
import test from "node:test";
import {
  type GameInfo,
  GameConfigError,
  Mulberry32,
  createGameInfo,
  dealHoleAndBoardCards,
  deckSize,
  generateDeck,
  generateShuffledDeck,
  loadGameInfo,
  parseGameInfo,
  toGameInfoFile,
  totalBoardCards
} from "../src/index.js";
import { gamePath, loadGame } from "./helpers.js";

function base(): GameInfo {
  return {
    startingStacks: [10n, 10n],
    blinds: [1n, 2n],
    raiseSizes: [0n],
    bettingType: "NoLimit",
    numPlayers: 2,
    numRounds: 1,
    maxRaises: [3],
    firstPlayer: [0],
    numSuits: 4,
    numRanks: 13,
    numHoleCards: 2,
    numBoardCards: [0]
  };
}

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof GameConfigError) return err.issues;
    throw err;
  }
  assert.fail("expected a GameConfigError");
}

test("gameInfo: bundled games load", () => {
  const kuhn = loadGame("kuhn.json");
  assert.equal(kuhn.bettingType, "Limit");
  assert.deepEqual(kuhn.startingStacks, [100n, 100n]);
  assert.equal(deckSize(kuhn), 3);

  const holdem = loadGame("holdem-nl-2p.json");
  assert.deepEqual(holdem.blinds, [1n, 2n]);
  assert.deepEqual(holdem.firstPlayer, [0, 1, 1, 1]);
  assert.equal(Object.isFrozen(holdem), true);
  assert.equal(Object.isFrozen(holdem.blinds), true);
});

test("gameInfo: per-player and per-round arrays must match their counts", () => {
  const issues = issuesOf(() => createGameInfo({ ...base(), blinds: [1n], maxRaises: [3, 3] }));
  assert.deepEqual(issues, [
    "blinds has 1 entries, expected one per player (2)",
    "maxRaises has 2 entries, expected one per round (1)"
  ]);
});

test("gameInfo: counts outside their limits are rejected", () => {
  const issues = issuesOf(() => createGameInfo({ ...base(), numPlayers: 1, startingStacks: [10n], blinds: [1n] }));
  assert.deepEqual(issues, ["numPlayers must be an integer in [2, 22], got 1"]);

  const rounds = issuesOf(() =>
    createGameInfo({
      ...base(),
      numRounds: 5,
      raiseSizes: [0n, 0n, 0n, 0n, 0n],
      maxRaises: [1, 1, 1, 1, 1],
      firstPlayer: [0, 0, 0, 0, 0],
      numBoardCards: [0, 0, 0, 0, 0]
    })
  );
  assert.deepEqual(rounds, ["numRounds must be an integer in [1, 4], got 5"]);
});

test("gameInfo: a blind larger than its stack is rejected", () => {
  const issues = issuesOf(() => createGameInfo({ ...base(), startingStacks: [10n, 1n] }));
  assert.deepEqual(issues, ["blinds[1] (2) exceeds startingStacks[1] (1)"]);
});

test("gameInfo: first player and board sizes are range checked", () => {
  const issues = issuesOf(() => createGameInfo({ ...base(), firstPlayer: [2], numBoardCards: [8] }));
  assert.deepEqual(issues, [
    "firstPlayer[0] must be an integer in [0, 1], got 2",
    "numBoardCards[0] must be an integer in [0, 7], got 8",
    "numBoardCards sums to 8, more than 7"
  ]);
});

test("gameInfo: showdown hands of three or four cards are rejected", () => {
  assert.deepEqual(issuesOf(() => createGameInfo({ ...base(), numHoleCards: 3 })), [
    "showdown hands have 3 cards; they need 1, 2, or at least 5"
  ]);
  assert.deepEqual(issuesOf(() => createGameInfo({ ...base(), numBoardCards: [2] })), [
    "showdown hands have 4 cards; they need 1, 2, or at least 5"
  ]);
  assert.equal(createGameInfo({ ...base(), numHoleCards: 5 }).numHoleCards, 5);
});

test("gameInfo: the deck must cover every hole and board card", () => {
  const issues = issuesOf(() => createGameInfo({ ...base(), numSuits: 1, numRanks: 3 }));
  assert.deepEqual(issues, ["dealing needs 4 cards but the deck has 3"]);
});

test("gameInfo: GameConfigError lists its issues in the message", () => {
  const err = new GameConfigError("Invalid game definition.", ["a", "b"]);
  assert.equal(err.message, "Invalid game definition.\n  - a\n  - b");
  assert.equal(new GameConfigError("plain").message, "plain");
});

test("gameInfo: parse accepts decimal strings for large chip counts", () => {
  const info = parseGameInfo({
    ...toGameInfoFile(base()),
    starting_stacks: ["100000000000000000000", 10]
  });
  assert.deepEqual(info.startingStacks, [100000000000000000000n, 10n]);
});

test("gameInfo: parse rejects unknown keys and wrong types", () => {
  const unknownKey = issuesOf(() => parseGameInfo({ ...toGameInfoFile(base()), ante: 1 }));
  assert.equal(unknownKey.length, 1);

  assert.throws(
    () => parseGameInfo({ ...toGameInfoFile(base()), betting_type: "PotLimit" }),
    (e) => e instanceof GameConfigError && e.message.startsWith("Malformed game definition.")
  );
  assert.throws(
    () => parseGameInfo({ ...toGameInfoFile(base()), blinds: [-1, 2] }),
    (e) => e instanceof GameConfigError
  );
});

test("gameInfo: file form survives a round trip", () => {
  const info = loadGame("holdem-limit-3p.json");
  assert.deepEqual(parseGameInfo(toGameInfoFile(info)), info);
});

test("gameInfo: unreadable files become config errors", () => {
  assert.throws(
    () => loadGameInfo(gamePath("does-not-exist.json")),
    (e) => e instanceof GameConfigError && e.message.startsWith("Failed to read game definition")
  );
});

test("gameInfo: board cards accumulate over rounds", () => {
  const info = loadGame("holdem-nl-2p.json");
  assert.deepEqual([0, 1, 2, 3].map((r) => totalBoardCards(info, r)), [0, 3, 4, 5]);
  assert.throws(() => totalBoardCards(info, 4), RangeError);
  assert.throws(() => totalBoardCards(info, -1), RangeError);
});

test("gameInfo: deck is rank-major and restartable", () => {
  const deck = generateDeck(loadGame("leduc.json"));
  assert.deepEqual(Array.from(deck), [0, 13, 1, 14, 2, 15]);
  assert.deepEqual(Array.from(deck), [0, 13, 1, 14, 2, 15]);
  assert.equal(Array.from(generateDeck(loadGame("holdem-nl-2p.json"))).length, 52);
});

test("gameInfo: shuffling permutes the deck deterministically", () => {
  const info = loadGame("holdem-nl-2p.json");
  const a = generateShuffledDeck(info, new Mulberry32(42));
  const b = generateShuffledDeck(info, new Mulberry32(42));
  assert.deepEqual(a, b);
  assert.deepEqual(
    a.slice().sort((x, y) => x - y),
    Array.from({ length: 52 }, (_, i) => i)
  );
});

test("gameInfo: dealing hands out distinct hole and board cards", () => {
  const info = loadGame("holdem-limit-3p.json");
  const deal = dealHoleAndBoardCards(info, new Mulberry32(9));
  assert.equal(deal.holeCards.length, 3);
  for (const hole of deal.holeCards) assert.equal(hole.length, 2);
  assert.equal(deal.boardCards.length, 5);

  const all = [...deal.holeCards.flat(), ...deal.boardCards];
  assert.equal(new Set(all).size, all.length);
  assert.deepEqual(dealHoleAndBoardCards(info, new Mulberry32(9)), deal);
});
