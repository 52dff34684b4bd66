export {
  type CardId,
  type Rank,
  type Suit,
  NUM_RANKS,
  NUM_SUITS,
  assertValidCardId,
  cardFromString,
  cardIdFromRankSuit,
  cardRank,
  cardRankIndex,
  cardSuit,
  cardToString,
  cardsFromString,
  cardsToString,
  rankFromIndex,
  suitFromIndex
} from "./cards.js";
export { HandCategory, type HandRank, compareHandRank, formatHandRank, highCard, onePair } from "./handRank.js";
export { MIN_EVAL_CARDS, evaluate5, evaluate7, evaluateBest, winners } from "./evaluate.js";
