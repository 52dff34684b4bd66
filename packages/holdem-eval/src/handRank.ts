import type { Rank } from "./cards.js";

export enum HandCategory {
  HighCard = 0,
  OnePair = 1,
  TwoPair = 2,
  Trips = 3,
  Straight = 4,
  Flush = 5,
  FullHouse = 6,
  Quads = 7,
  StraightFlush = 8
}

/**
 * A rank class: a category plus the ranks that order hands inside it.
 *
 * Consumers are only allowed to look at a rank class through
 * {@link compareHandRank}; the fields are public for display and tests.
 */
export type HandRank = Readonly<{
  category: HandCategory;
  /**
   * Lexicographic tiebreakers, high-to-low.
   * - Straight: [highCard] (wheel = 5)
   * - Quads: [quadRank, kicker]
   * - TwoPair: [highPair, lowPair, kicker]
   */
  tiebreakers: readonly number[];
}>;

export function compareHandRank(a: HandRank, b: HandRank): -1 | 0 | 1 {
  if (a.category !== b.category) {
    return a.category < b.category ? -1 : 1;
  }

  const len = Math.max(a.tiebreakers.length, b.tiebreakers.length);
  for (let i = 0; i < len; i += 1) {
    const av = a.tiebreakers[i] ?? 0;
    const bv = b.tiebreakers[i] ?? 0;
    if (av !== bv) {
      return av < bv ? -1 : 1;
    }
  }

  return 0;
}

export function highCard(...ranksDesc: Rank[]): HandRank {
  return { category: HandCategory.HighCard, tiebreakers: ranksDesc };
}

export function onePair(pair: Rank, ...kickersDesc: Rank[]): HandRank {
  return { category: HandCategory.OnePair, tiebreakers: [pair, ...kickersDesc] };
}

const CATEGORY_NAMES: Readonly<Record<HandCategory, string>> = {
  [HandCategory.HighCard]: "high card",
  [HandCategory.OnePair]: "pair",
  [HandCategory.TwoPair]: "two pair",
  [HandCategory.Trips]: "three of a kind",
  [HandCategory.Straight]: "straight",
  [HandCategory.Flush]: "flush",
  [HandCategory.FullHouse]: "full house",
  [HandCategory.Quads]: "four of a kind",
  [HandCategory.StraightFlush]: "straight flush"
};

export function formatHandRank(rank: HandRank): string {
  return `${CATEGORY_NAMES[rank.category]} (${rank.tiebreakers.join(",")})`;
}
