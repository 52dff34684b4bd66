import { readFileSync } from "node:fs";
import { z } from "zod";
import { type CardId, cardRankIndex, cardSuit } from "@handstate/holdem-eval";
import { GameConfigError } from "./errors.js";
import { totalBoardCards } from "./gameInfo.js";
import type { GameInfo } from "./types.js";

export type BucketId = number;

interface BucketShape {
  readonly numSuits: number;
  readonly numRanks: number;
  /** Board cards visible in the round (cumulative). */
  readonly numBoardCards: number;
  readonly numHoleCards: number;
}

/**
 * How one round maps cards to buckets.
 * - NoBuckets: every ordered (hole, board) deal gets its own bucket.
 * - LosslessBuckets: deals equal up to suit renaming and card order share a bucket.
 */
export type RoundBuckets = (BucketShape & { readonly kind: "NoBuckets" }) | (BucketShape & { readonly kind: "LosslessBuckets" });

export type RoundBucketsKind = RoundBuckets["kind"];

function shapeFor(info: GameInfo, round: number): BucketShape {
  return {
    numSuits: info.numSuits,
    numRanks: info.numRanks,
    numBoardCards: totalBoardCards(info, round),
    numHoleCards: info.numHoleCards
  };
}

export function createRoundBuckets(kind: RoundBucketsKind, info: GameInfo, round: number): RoundBuckets {
  const buckets: RoundBuckets = { kind, ...shapeFor(info, round) };
  return buckets;
}

function bucketCount(shape: BucketShape): number {
  return (shape.numSuits * shape.numRanks) ** (shape.numHoleCards + shape.numBoardCards);
}

function cardIndex(shape: BucketShape, rankIndex: number, suit: number): number {
  return rankIndex * shape.numSuits + suit;
}

function positionalBucket(shape: BucketShape, cards: readonly { rank: number; suit: number }[]): BucketId {
  const base = shape.numSuits * shape.numRanks;
  let bucket = 0;
  for (const c of cards) bucket = bucket * base + cardIndex(shape, c.rank, c.suit);
  return bucket;
}

function takeCards(cards: readonly CardId[], count: number, what: string): { rank: number; suit: number }[] {
  if (cards.length < count) throw new RangeError(`expected ${count} ${what} cards, got ${cards.length}`);
  return cards.slice(0, count).map((c) => ({ rank: cardRankIndex(c), suit: cardSuit(c) }));
}

function permutations(n: number): number[][] {
  if (n === 0) return [[]];
  const out: number[][] = [];
  for (const rest of permutations(n - 1)) {
    for (let i = 0; i <= rest.length; i++) out.push([...rest.slice(0, i), n - 1, ...rest.slice(i)]);
  }
  return out;
}

const byRankThenSuit = (a: { rank: number; suit: number }, b: { rank: number; suit: number }): number =>
  b.rank - a.rank || a.suit - b.suit;

export function getRoundBucket(buckets: RoundBuckets, boardCards: readonly CardId[], holeCards: readonly CardId[]): BucketId {
  const hole = takeCards(holeCards, buckets.numHoleCards, "hole");
  const board = takeCards(boardCards, buckets.numBoardCards, "board");

  switch (buckets.kind) {
    case "NoBuckets":
      return positionalBucket(buckets, [...hole, ...board]);
    case "LosslessBuckets": {
      let best: BucketId | null = null;
      for (const perm of permutations(buckets.numSuits)) {
        const relabel = (c: { rank: number; suit: number }) => ({ rank: c.rank, suit: perm[c.suit] ?? c.suit });
        const id = positionalBucket(buckets, [
          ...hole.map(relabel).sort(byRankThenSuit),
          ...board.map(relabel).sort(byRankThenSuit)
        ]);
        if (best === null || id < best) best = id;
      }
      return best ?? 0;
    }
  }
}

const RoundBucketsKindSchema = z.enum(["NoBuckets", "LosslessBuckets"]);

export const CardAbstractionFileSchema = z.object({ rounds: z.array(RoundBucketsKindSchema) }).strict();

/** One bucketing strategy per round. */
export class CardAbstraction {
  readonly rounds: readonly RoundBuckets[];

  constructor(rounds: readonly RoundBuckets[]) {
    const issues: string[] = [];
    rounds.forEach((r, i) => {
      if (bucketCount(r) > Number.MAX_SAFE_INTEGER) {
        issues.push(`round ${i}: ${r.kind} bucket ids would exceed Number.MAX_SAFE_INTEGER`);
      }
    });
    if (issues.length > 0) throw new GameConfigError("Card abstraction is too large.", issues);
    this.rounds = rounds.slice();
  }

  /** Same strategy in every round of `info`. */
  static uniform(kind: RoundBucketsKind, info: GameInfo): CardAbstraction {
    return new CardAbstraction(Array.from({ length: info.numRounds }, (_, r) => createRoundBuckets(kind, info, r)));
  }

  static fromJson(raw: unknown, info: GameInfo): CardAbstraction {
    const parsed = CardAbstractionFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GameConfigError(
        "Malformed card abstraction.",
        parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }
    const kinds = parsed.data.rounds;
    if (kinds.length !== info.numRounds) {
      throw new GameConfigError("Card abstraction does not fit the game.", [
        `rounds has ${kinds.length} entries, expected ${info.numRounds}`
      ]);
    }
    return new CardAbstraction(kinds.map((kind, r) => createRoundBuckets(kind, info, r)));
  }

  static fromConfig(path: string, info: GameInfo): CardAbstraction {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GameConfigError(`Failed to read card abstraction ${path}: ${reason}`);
    }
    return CardAbstraction.fromJson(raw, info);
  }

  getBucket(round: number, boardCards: readonly CardId[], holeCards: readonly CardId[]): BucketId {
    const buckets = this.rounds[round];
    if (buckets === undefined) throw new RangeError(`no buckets configured for round ${round}`);
    return getRoundBucket(buckets, boardCards, holeCards);
  }
}
