import { assertValidCardId, cardRank, cardSuit, type CardId, type Rank } from "./cards.js";
import { compareHandRank, type HandRank, HandCategory } from "./handRank.js";

export const MIN_EVAL_CARDS = 5;

function assertDistinct(cards: readonly CardId[], label: string): void {
  const seen = new Set<number>();
  for (const c of cards) {
    assertValidCardId(c);
    if (seen.has(c)) {
      throw new RangeError(`${label} contains duplicate card id ${c}.`);
    }
    seen.add(c);
  }
}

// Expects five distinct ranks, descending.
function straightHigh(uniqueRanksDesc: readonly Rank[]): Rank | null {
  if (uniqueRanksDesc.length !== 5) return null;
  const [top, second, , , bottom] = uniqueRanksDesc;
  if (top === undefined || second === undefined || bottom === undefined) return null;

  if (top === 14 && second === 5 && bottom === 2) return 5; // wheel
  return top - bottom === 4 ? top : null;
}

type RankGroup = { rank: Rank; count: number };

function groupRanks(ranksDesc: readonly Rank[]): RankGroup[] {
  const counts = new Map<Rank, number>();
  for (const r of ranksDesc) counts.set(r, (counts.get(r) ?? 0) + 1);
  return Array.from(counts, ([rank, count]) => ({ rank, count })).sort((a, b) =>
    b.count !== a.count ? b.count - a.count : b.rank - a.rank
  );
}

function kickers(groups: readonly RankGroup[]): Rank[] {
  return groups.filter((g) => g.count === 1).map((g) => g.rank);
}

export function evaluate5(cards5: readonly CardId[]): HandRank {
  if (cards5.length !== 5) {
    throw new RangeError(`evaluate5 expected 5 cards, got ${cards5.length}.`);
  }
  assertDistinct(cards5, "cards5");

  const firstSuit = cardSuit(cards5[0] ?? 0);
  const isFlush = cards5.every((c) => cardSuit(c) === firstSuit);
  const ranks = cards5.map(cardRank).sort((a, b) => b - a);
  const groups = groupRanks(ranks);
  const high = straightHigh(groups.map((g) => g.rank));

  const [first, second] = groups;
  if (first === undefined) throw new RangeError("evaluate5 received no ranks.");

  if (high !== null && isFlush) {
    return { category: HandCategory.StraightFlush, tiebreakers: [high] };
  }
  if (first.count === 4) {
    return { category: HandCategory.Quads, tiebreakers: [first.rank, ...kickers(groups)] };
  }
  if (first.count === 3 && second?.count === 2) {
    return { category: HandCategory.FullHouse, tiebreakers: [first.rank, second.rank] };
  }
  if (isFlush) {
    return { category: HandCategory.Flush, tiebreakers: ranks };
  }
  if (high !== null) {
    return { category: HandCategory.Straight, tiebreakers: [high] };
  }
  if (first.count === 3) {
    return { category: HandCategory.Trips, tiebreakers: [first.rank, ...kickers(groups)] };
  }
  if (first.count === 2 && second?.count === 2) {
    // groups are sorted, so first.rank > second.rank
    return { category: HandCategory.TwoPair, tiebreakers: [first.rank, second.rank, ...kickers(groups)] };
  }
  if (first.count === 2) {
    return { category: HandCategory.OnePair, tiebreakers: [first.rank, ...kickers(groups)] };
  }
  return { category: HandCategory.HighCard, tiebreakers: ranks };
}

function* combinations<T>(items: readonly T[], k: number, start = 0, prefix: T[] = []): Generator<T[]> {
  if (prefix.length === k) {
    yield prefix.slice();
    return;
  }
  for (let i = start; i <= items.length - (k - prefix.length); i += 1) {
    const item = items[i];
    if (item === undefined) continue;
    prefix.push(item);
    yield* combinations(items, k, i + 1, prefix);
    prefix.pop();
  }
}

/** Best five-card rank class among five or more distinct cards. */
export function evaluateBest(cards: readonly CardId[]): HandRank {
  if (cards.length < MIN_EVAL_CARDS) {
    throw new RangeError(`evaluateBest expected at least ${MIN_EVAL_CARDS} cards, got ${cards.length}.`);
  }
  assertDistinct(cards, "cards");

  let best: HandRank | null = null;
  for (const five of combinations(cards, 5)) {
    const rank = evaluate5(five);
    if (best === null || compareHandRank(rank, best) === 1) best = rank;
  }
  if (best === null) throw new RangeError("evaluateBest found no five-card combination.");
  return best;
}

export function evaluate7(cards7: readonly CardId[]): HandRank {
  if (cards7.length !== 7) {
    throw new RangeError(`evaluate7 expected 7 cards, got ${cards7.length}.`);
  }
  return evaluateBest(cards7);
}

/** Seats holding the best hand on a shared board, ascending. */
export function winners(
  board: readonly CardId[],
  holeCardsBySeat: Readonly<Record<number, readonly CardId[]>>
): number[] {
  let best: HandRank | null = null;
  let bestSeats: number[] = [];

  for (const [seatStr, hole] of Object.entries(holeCardsBySeat)) {
    const seat = Number(seatStr);
    const cards = [...board, ...hole];
    assertDistinct(cards, `seat ${seat} cards`);
    const rank = evaluateBest(cards);

    const cmp = best === null ? 1 : compareHandRank(rank, best);
    if (cmp === 1) {
      best = rank;
      bestSeats = [seat];
    } else if (cmp === 0) {
      bestSeats.push(seat);
    }
  }

  return bestSeats.sort((a, b) => a - b);
}
