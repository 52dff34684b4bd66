import assert from "node:assert/strict";
import test from "node:test";
import { type CardId, type HandRank, HandCategory, cardsFromString, onePair, highCard } from "@handstate/holdem-eval";
import {
  type GameState,
  Mulberry32,
  PokerEngineError,
  createGameInfo,
  createGameState,
  dealHoleAndBoardCards,
  getPayout,
  getPayouts,
  handRankForCards,
  isValidAction,
  raiseRange
} from "../src/index.js";
import { call, fold, loadGame, noLimitGame, play, raise } from "./helpers.js";

const board = cardsFromString("2c 3d 8h 9s Kc");

test("payout: heads-up showdown moves the loser's chips", () => {
  const info = loadGame("holdem-nl-2p.json");
  const s = play(info, createGameState(info, 1), Array.from({ length: 8 }, () => call));
  const holes = [cardsFromString("As Ad"), cardsFromString("7c 4d")];

  assert.deepEqual(getPayouts(info, s, board, holes), [2n, -2n]);
});

test("payout: four hole cards and a full board rank the best five of nine", () => {
  const info = createGameInfo({ ...loadGame("holdem-nl-2p.json"), numHoleCards: 4 });
  const s = play(info, createGameState(info, 1), Array.from({ length: 8 }, () => call));
  const holes = [cardsFromString("Ah Kh 7c 7d"), cardsFromString("As Ad Ks Kd")];

  assert.deepEqual(getPayouts(info, s, cardsFromString("Qh Jh Th 2s 3c"), holes), [2n, -2n]);
});

test("payout: folded blind pays into the winner's layer", () => {
  const info = noLimitGame([100n, 100n, 100n], [0n, 1n, 2n]);
  const s = play(info, createGameState(info, 1), [raise(10n), fold, call, ...Array.from({ length: 6 }, () => call)]);
  assert.equal(s.finished, true);
  const holes = [cardsFromString("As Ad"), cardsFromString("Ks Kd"), cardsFromString("7c 4d")];

  assert.deepEqual(getPayouts(info, s, board, holes), [11n, -1n, -10n]);
});

test("payout: last player standing takes every other commitment", () => {
  const info = noLimitGame([100n, 100n, 100n], [0n, 1n, 2n]);
  const s = play(info, createGameState(info, 1), [raise(10n), fold, fold]);

  assert.deepEqual(getPayouts(info, s, [], []), [3n, -1n, -2n]);
});

test("payout: short all-in wins only the main pot", () => {
  const info = noLimitGame([5n, 20n, 20n], [0n, 1n, 2n]);
  const s = play(info, createGameState(info, 1), [raise(5n), raise(20n), call]);
  const holes = [cardsFromString("As Ad"), cardsFromString("Ks Kd"), cardsFromString("Qs 3d")];
  const fullBoard = cardsFromString("2c 7d 9h Js 4c");

  assert.deepEqual(getPayouts(info, s, fullBoard, holes), [10n, 10n, -20n]);
});

test("payout: split pots truncate the odd chip", () => {
  const info = createGameInfo({
    startingStacks: [5n, 5n, 5n],
    blinds: [0n, 0n, 0n],
    raiseSizes: [0n],
    bettingType: "NoLimit",
    numPlayers: 3,
    numRounds: 1,
    maxRaises: [4],
    firstPlayer: [0],
    numSuits: 4,
    numRanks: 13,
    numHoleCards: 1,
    numBoardCards: [0]
  });
  const s = play(info, createGameState(info, 1), [raise(5n), call, call]);
  assert.equal(s.finished, true);
  const holes = [cardsFromString("Ac"), cardsFromString("Ad"), cardsFromString("Kc")];

  const payouts = getPayouts(info, s, [], holes);
  assert.deepEqual(payouts, [2n, 2n, -5n]);
  assert.equal(payouts.reduce((a, b) => a + b, 0n), -1n);
});

test("payout: a folded player's loss is known before the hand ends", () => {
  const info = noLimitGame([100n, 100n, 100n], [0n, 1n, 2n]);
  const s = play(info, createGameState(info, 1), [raise(10n), fold]);
  assert.equal(s.finished, false);

  assert.equal(getPayout(info, s, [], [], 1), -1n);
  assert.throws(
    () => getPayout(info, s, [], [], 0),
    (e) => e instanceof PokerEngineError && e.code === "HAND_NOT_FINISHED"
  );
});

test("payout: out-of-range player is rejected", () => {
  const info = loadGame("holdem-nl-2p.json");
  const s = createGameState(info, 1);
  for (const p of [-1, 2, 0.5]) {
    assert.throws(
      () => getPayout(info, s, [], [], p),
      (e) => e instanceof PokerEngineError && e.code === "INVALID_PLAYER"
    );
  }
});

test("payout: a player who never put chips in breaks even", () => {
  const info = createGameInfo({
    startingStacks: [50n, 50n, 50n],
    blinds: [0n, 0n, 0n],
    raiseSizes: [0n],
    bettingType: "NoLimit",
    numPlayers: 3,
    numRounds: 1,
    maxRaises: [4],
    firstPlayer: [0],
    numSuits: 4,
    numRanks: 13,
    numHoleCards: 1,
    numBoardCards: [0]
  });
  const s = play(info, createGameState(info, 1), [call, call, call]);
  assert.equal(s.finished, true);
  const holes = [cardsFromString("2c"), cardsFromString("3c"), cardsFromString("4c")];

  assert.deepEqual(getPayouts(info, s, [], holes), [0n, 0n, 0n]);
});

test("payout: one- and two-card hands rank without the evaluator", () => {
  const refuse = (): HandRank => {
    throw new Error("evaluator should not be called");
  };
  assert.deepEqual(handRankForCards(cardsFromString("Qd"), refuse), highCard(12));
  assert.deepEqual(handRankForCards(cardsFromString("Kc Kd"), refuse), onePair(13));
  assert.deepEqual(handRankForCards(cardsFromString("4c Jd"), refuse), highCard(11));
  assert.equal(handRankForCards(cardsFromString("As Ks Qs Js Ts")).category, HandCategory.StraightFlush);
});

test("payout: Leduc pair beats a higher single card", () => {
  const info = loadGame("leduc.json");
  const s = play(info, createGameState(info, 1), [call, call, raise(4n), call]);
  assert.equal(s.finished, true);
  assert.deepEqual(s.spent, [5n, 5n]);

  const holes: CardId[][] = [cardsFromString("Kc"), cardsFromString("2c")];
  assert.deepEqual(getPayouts(info, s, cardsFromString("2d"), holes), [-5n, 5n]);
});

// Orders hands by their first card only, so no two players tie.
const byFirstCard = (cards: readonly CardId[]): HandRank => ({
  category: HandCategory.HighCard,
  tiebreakers: [cards[0] ?? -1]
});

function randomHand(seed: number): { s: GameState; payouts: bigint[] } {
  const info = noLimitGame([30n, 120n, 75n, 200n], [0n, 0n, 1n, 2n]);
  const rng = new Mulberry32(seed);
  let s = createGameState(info, seed);
  while (!s.finished) {
    const options = [fold, call];
    const range = raiseRange(info, s);
    if (range) {
      options.push(raise(range.min), raise(range.max));
      if (range.max > range.min) options.push(raise(range.min + BigInt(rng.int(0, Number(range.max - range.min)))));
    }
    const legal = options.filter((a) => isValidAction(info, s, a));
    const pick = legal[rng.int(0, legal.length)];
    assert.ok(pick);
    s = play(info, s, [pick]);
  }
  const deal = dealHoleAndBoardCards(info, rng);
  return { s, payouts: getPayouts(info, s, deal.boardCards, deal.holeCards, byFirstCard) };
}

test("payout: chips are conserved when hands never tie", () => {
  for (let seed = 1; seed <= 200; seed++) {
    const { s, payouts } = randomHand(seed);
    assert.equal(
      payouts.reduce((a, b) => a + b, 0n),
      0n,
      `seed ${seed}`
    );
    payouts.forEach((v, p) => {
      assert.ok(v >= -(s.spent[p] ?? 0n), `player ${p} lost more than it committed (seed ${seed})`);
    });
  }
});
