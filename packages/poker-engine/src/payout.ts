import {
  type CardId,
  type HandRank,
  cardRank,
  compareHandRank,
  evaluateBest,
  highCard,
  onePair
} from "@handstate/holdem-eval";
import { hasFolded, numFolded, playerSpent } from "./engine.js";
import { PokerEngineError } from "./errors.js";
import type { Chips, GameInfo, GameState, PlayerId } from "./types.js";

/** Maps hole + board cards to a rank class; only its order via compareHandRank is used. */
export type HandEvaluator = (cards: readonly CardId[]) => HandRank;

/**
 * One- and two-card hands (Kuhn and Leduc style decks) are ranked here:
 * high card, or a pair. Anything larger goes to the evaluator.
 */
export function handRankForCards(cards: readonly CardId[], evaluate: HandEvaluator = evaluateBest): HandRank {
  const [a, b] = cards;
  if (cards.length === 1 && a !== undefined) return highCard(cardRank(a));
  if (cards.length === 2 && a !== undefined && b !== undefined) {
    const ra = cardRank(a);
    const rb = cardRank(b);
    if (ra === rb) return onePair(ra);
    return highCard(ra > rb ? ra : rb);
  }
  return evaluate(cards);
}

interface Contender {
  player: PlayerId;
  remaining: Chips;
  rank: HandRank | null; // null: folded, contributes chips but never wins
}

function collectContenders(
  info: GameInfo,
  state: GameState,
  boardCards: readonly CardId[],
  holeCards: readonly (readonly CardId[])[],
  evaluate: HandEvaluator
): Contender[] {
  const out: Contender[] = [];
  for (let p = 0; p < info.numPlayers; p++) {
    const spent = playerSpent(state, p);
    if (spent === 0n) continue;

    let rank: HandRank | null = null;
    if (!hasFolded(state, p)) {
      const hole = holeCards[p];
      if (hole === undefined) {
        throw new PokerEngineError("INVALID_PLAYER", `Missing hole cards for player ${p}.`, { player: p });
      }
      rank = handRankForCards([...hole, ...boardCards], evaluate);
    }
    out.push({ player: p, remaining: spent, rank });
  }
  return out;
}

/**
 * Net chips won (positive) or lost (negative) by `player` in a finished hand.
 *
 * Side pots are resolved layer by layer: the smallest outstanding commitment
 * among the remaining contenders forms a layer that every contender pays into
 * and the best non-folded hands split. Splits truncate, so an uneven layer
 * leaks its remainder (the sum of all payouts is then slightly negative).
 */
export function getPayout(
  info: GameInfo,
  state: GameState,
  boardCards: readonly CardId[],
  holeCards: readonly (readonly CardId[])[],
  player: PlayerId,
  evaluate: HandEvaluator = evaluateBest
): Chips {
  if (!Number.isInteger(player) || player < 0 || player >= info.numPlayers) {
    throw new PokerEngineError("INVALID_PLAYER", `player must be in [0, ${info.numPlayers - 1}]`, { player });
  }

  if (hasFolded(state, player)) return -playerSpent(state, player);

  if (!state.finished) {
    throw new PokerEngineError("HAND_NOT_FINISHED", "cannot calculate payout before the hand is over", {
      handId: state.handId,
      player
    });
  }

  if (numFolded(state) + 1 === info.numPlayers) {
    let won = 0n;
    for (let p = 0; p < info.numPlayers; p++) if (p !== player) won += playerSpent(state, p);
    return won;
  }

  let live = collectContenders(info, state, boardCards, holeCards, evaluate);
  if (!live.some((c) => c.player === player)) return 0n; // never put a chip in

  let value = 0n;
  for (;;) {
    let size: Chips | null = null;
    let best: HandRank | null = null;
    let numWinners = 0;
    for (const c of live) {
      if (size === null || c.remaining < size) size = c.remaining;
      if (c.rank === null) continue;
      const cmp = best === null ? 1 : compareHandRank(c.rank, best);
      if (cmp > 0) {
        best = c.rank;
        numWinners = 1;
      } else if (cmp === 0) {
        numWinners += 1;
      }
    }

    const me = live.find((c) => c.player === player);
    if (size === null || best === null || me === undefined) {
      throw new PokerEngineError("INVARIANT", "side pot layer has no winner", { handId: state.handId, player });
    }

    if (me.rank !== null && compareHandRank(me.rank, best) === 0) {
      value += (size * BigInt(live.length - numWinners)) / BigInt(numWinners);
    } else {
      value -= size;
    }

    if (me.remaining === size) return value;

    const layer = size;
    live = live.map((c) => ({ ...c, remaining: c.remaining - layer })).filter((c) => c.remaining > 0n);
  }
}

export function getPayouts(
  info: GameInfo,
  state: GameState,
  boardCards: readonly CardId[],
  holeCards: readonly (readonly CardId[])[],
  evaluate: HandEvaluator = evaluateBest
): Chips[] {
  return Array.from({ length: info.numPlayers }, (_, p) => getPayout(info, state, boardCards, holeCards, p, evaluate));
}
