export type CardId = number; // 0..51, suit * 13 + (rank - 2)

export type Suit = 0 | 1 | 2 | 3;

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14; // 14 = Ace

export const NUM_RANKS = 13;
export const NUM_SUITS = 4;

const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
const SUITS: readonly Suit[] = [0, 1, 2, 3];
const RANK_CHARS = "23456789TJQKA";
const SUIT_CHARS = "cdhs";

export function assertValidCardId(card: CardId): void {
  if (!Number.isInteger(card) || card < 0 || card >= NUM_RANKS * NUM_SUITS) {
    throw new RangeError(`Invalid card id ${card}; expected integer in [0, 51].`);
  }
}

/** Zero-based rank position: deuce is 0, ace is 12. */
export function cardRankIndex(card: CardId): number {
  assertValidCardId(card);
  return card % NUM_RANKS;
}

export function cardSuit(card: CardId): Suit {
  assertValidCardId(card);
  const suit = SUITS[Math.floor(card / NUM_RANKS)];
  if (suit === undefined) throw new RangeError(`Invalid card id ${card}.`);
  return suit;
}

export function cardRank(card: CardId): Rank {
  const rank = RANKS[cardRankIndex(card)];
  if (rank === undefined) throw new RangeError(`Invalid card id ${card}.`);
  return rank;
}

export function rankFromIndex(index: number): Rank {
  const rank = RANKS[index];
  if (rank === undefined) {
    throw new RangeError(`Invalid rank index ${index}; expected integer in [0, 12].`);
  }
  return rank;
}

export function suitFromIndex(index: number): Suit {
  const suit = SUITS[index];
  if (suit === undefined) {
    throw new RangeError(`Invalid suit index ${index}; expected integer in [0, 3].`);
  }
  return suit;
}

export function cardIdFromRankSuit(rank: Rank, suit: Suit): CardId {
  if (!Number.isInteger(rank) || rank < 2 || rank > 14) {
    throw new RangeError(`Invalid rank ${rank}; expected integer in [2, 14].`);
  }
  if (!Number.isInteger(suit) || suit < 0 || suit > 3) {
    throw new RangeError(`Invalid suit ${suit}; expected integer in [0, 3].`);
  }
  return suit * NUM_RANKS + (rank - 2);
}

export function cardToString(card: CardId): string {
  return `${RANK_CHARS[cardRankIndex(card)]}${SUIT_CHARS[cardSuit(card)]}`;
}

export function cardFromString(s: string): CardId {
  if (s.length !== 2) {
    throw new TypeError(`Invalid card string ${JSON.stringify(s)}; expected like "As" or "2c".`);
  }

  const rankIndex = RANK_CHARS.indexOf(s.charAt(0).toUpperCase());
  if (rankIndex === -1) {
    throw new RangeError(`Invalid rank character ${JSON.stringify(s.charAt(0))} in ${JSON.stringify(s)}.`);
  }

  const suitIndex = SUIT_CHARS.indexOf(s.charAt(1).toLowerCase());
  if (suitIndex === -1) {
    throw new RangeError(`Invalid suit character ${JSON.stringify(s.charAt(1))} in ${JSON.stringify(s)}.`);
  }

  return suitIndex * NUM_RANKS + rankIndex;
}

/** Parses whitespace-separated cards, e.g. `"As Kd 7c"`. */
export function cardsFromString(s: string): CardId[] {
  return s
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(cardFromString);
}

export function cardsToString(cards: readonly CardId[]): string {
  return cards.map(cardToString).join(" ");
}
