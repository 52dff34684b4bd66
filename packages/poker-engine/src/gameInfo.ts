import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { type CardId, cardIdFromRankSuit, rankFromIndex, suitFromIndex } from "@handstate/holdem-eval";
import { GameConfigError } from "./errors.js";
import { type Rng, shuffleInPlace } from "./rng.js";
import {
  MAX_BOARD_CARDS,
  MAX_HOLE_CARDS,
  MAX_PLAYERS,
  MAX_ROUNDS,
  type Chips,
  type GameInfo
} from "./types.js";

export const ChipsSchema = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/, "expected a decimal chip amount")])
  .transform((v) => BigInt(v));

const CountSchema = z.number().int().nonnegative();

// On-disk layout: snake_case keys, one entry per player or per round.
export const GameInfoFileSchema = z
  .object({
    starting_stacks: z.array(ChipsSchema),
    blinds: z.array(ChipsSchema),
    raise_sizes: z.array(ChipsSchema),
    betting_type: z.enum(["Limit", "NoLimit"]),
    num_players: CountSchema,
    num_rounds: CountSchema,
    max_raises: z.array(CountSchema),
    first_player: z.array(CountSchema),
    num_suits: CountSchema,
    num_ranks: CountSchema,
    num_hole_cards: CountSchema,
    num_board_cards: z.array(CountSchema)
  })
  .strict();

export type GameInfoFile = z.input<typeof GameInfoFileSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

function checkLength(issues: string[], name: string, values: readonly unknown[], expected: number, per: string): void {
  if (values.length !== expected) {
    issues.push(`${name} has ${values.length} entries, expected one per ${per} (${expected})`);
  }
}

function checkRange(issues: string[], name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    issues.push(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

function checkChips(issues: string[], name: string, values: readonly Chips[]): void {
  values.forEach((v, i) => {
    if (v < 0n) issues.push(`${name}[${i}] must be >= 0, got ${v}`);
  });
}

/**
 * Validates a ruleset and returns a frozen copy. Every per-player array must
 * have `numPlayers` entries and every per-round array `numRounds` entries.
 */
export function createGameInfo(fields: GameInfo): GameInfo {
  const issues: string[] = [];
  const { numPlayers, numRounds } = fields;

  checkRange(issues, "numPlayers", numPlayers, 2, MAX_PLAYERS);
  checkRange(issues, "numRounds", numRounds, 1, MAX_ROUNDS);
  checkRange(issues, "numSuits", fields.numSuits, 1, 4);
  checkRange(issues, "numRanks", fields.numRanks, 1, 13);
  checkRange(issues, "numHoleCards", fields.numHoleCards, 1, MAX_HOLE_CARDS);

  checkLength(issues, "startingStacks", fields.startingStacks, numPlayers, "player");
  checkLength(issues, "blinds", fields.blinds, numPlayers, "player");
  checkLength(issues, "raiseSizes", fields.raiseSizes, numRounds, "round");
  checkLength(issues, "maxRaises", fields.maxRaises, numRounds, "round");
  checkLength(issues, "firstPlayer", fields.firstPlayer, numRounds, "round");
  checkLength(issues, "numBoardCards", fields.numBoardCards, numRounds, "round");

  checkChips(issues, "startingStacks", fields.startingStacks);
  checkChips(issues, "blinds", fields.blinds);
  checkChips(issues, "raiseSizes", fields.raiseSizes);

  fields.blinds.forEach((blind, p) => {
    const stack = fields.startingStacks[p];
    if (stack !== undefined && blind > stack) {
      issues.push(`blinds[${p}] (${blind}) exceeds startingStacks[${p}] (${stack})`);
    }
  });
  fields.firstPlayer.forEach((p, r) => checkRange(issues, `firstPlayer[${r}]`, p, 0, numPlayers - 1));
  fields.maxRaises.forEach((m, r) => checkRange(issues, `maxRaises[${r}]`, m, 0, Number.MAX_SAFE_INTEGER));
  fields.numBoardCards.forEach((n, r) => checkRange(issues, `numBoardCards[${r}]`, n, 0, MAX_BOARD_CARDS));

  const totalBoard = fields.numBoardCards.reduce((a, b) => a + b, 0);
  if (totalBoard > MAX_BOARD_CARDS) {
    issues.push(`numBoardCards sums to ${totalBoard}, more than ${MAX_BOARD_CARDS}`);
  }
  const showdownCards = fields.numHoleCards + totalBoard;
  if (showdownCards === 3 || showdownCards === 4) {
    issues.push(`showdown hands have ${showdownCards} cards; they need 1, 2, or at least 5`);
  }
  const needed = numPlayers * fields.numHoleCards + totalBoard;
  const available = fields.numSuits * fields.numRanks;
  if (needed > available) {
    issues.push(`dealing needs ${needed} cards but the deck has ${available}`);
  }

  if (issues.length > 0) throw new GameConfigError("Invalid game definition.", issues);

  return Object.freeze({
    ...fields,
    startingStacks: Object.freeze(fields.startingStacks.slice()),
    blinds: Object.freeze(fields.blinds.slice()),
    raiseSizes: Object.freeze(fields.raiseSizes.slice()),
    maxRaises: Object.freeze(fields.maxRaises.slice()),
    firstPlayer: Object.freeze(fields.firstPlayer.slice()),
    numBoardCards: Object.freeze(fields.numBoardCards.slice())
  });
}

export function parseGameInfo(raw: unknown): GameInfo {
  const parsed = GameInfoFileSchema.safeParse(raw);
  if (!parsed.success) throw new GameConfigError("Malformed game definition.", formatIssues(parsed.error));
  const f = parsed.data;
  return createGameInfo({
    startingStacks: f.starting_stacks,
    blinds: f.blinds,
    raiseSizes: f.raise_sizes,
    bettingType: f.betting_type,
    numPlayers: f.num_players,
    numRounds: f.num_rounds,
    maxRaises: f.max_raises,
    firstPlayer: f.first_player,
    numSuits: f.num_suits,
    numRanks: f.num_ranks,
    numHoleCards: f.num_hole_cards,
    numBoardCards: f.num_board_cards
  });
}

const GAMES_DIR = new URL("../games/", import.meta.url);

/** Path of a definition shipped in this package's games/ directory, e.g. "leduc.json". */
export function bundledGamePath(name: string): string {
  return fileURLToPath(new URL(name, GAMES_DIR));
}

export function loadGameInfo(path: string): GameInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GameConfigError(`Failed to read game definition ${path}: ${reason}`);
  }
  return parseGameInfo(raw);
}

export function toGameInfoFile(info: GameInfo): GameInfoFile {
  return {
    starting_stacks: info.startingStacks.map(String),
    blinds: info.blinds.map(String),
    raise_sizes: info.raiseSizes.map(String),
    betting_type: info.bettingType,
    num_players: info.numPlayers,
    num_rounds: info.numRounds,
    max_raises: info.maxRaises.slice(),
    first_player: info.firstPlayer.slice(),
    num_suits: info.numSuits,
    num_ranks: info.numRanks,
    num_hole_cards: info.numHoleCards,
    num_board_cards: info.numBoardCards.slice()
  };
}

/** Board cards visible in `round`; boards accumulate across rounds. */
export function totalBoardCards(info: GameInfo, round: number): number {
  if (!Number.isInteger(round) || round < 0 || round >= info.numRounds) {
    throw new RangeError(`round must be in [0, ${info.numRounds - 1}], got ${round}`);
  }
  let total = 0;
  for (let r = 0; r <= round; r++) total += info.numBoardCards[r] ?? 0;
  return total;
}

export function deckSize(info: GameInfo): number {
  return info.numRanks * info.numSuits;
}

/**
 * The lowest `numRanks` ranks crossed with the first `numSuits` suits,
 * rank-major. Each iteration starts from the beginning.
 */
export function generateDeck(info: GameInfo): Iterable<CardId> {
  const { numRanks, numSuits } = info;
  return {
    *[Symbol.iterator]() {
      for (let r = 0; r < numRanks; r++) {
        for (let s = 0; s < numSuits; s++) {
          yield cardIdFromRankSuit(rankFromIndex(r), suitFromIndex(s));
        }
      }
    }
  };
}

export function generateShuffledDeck(info: GameInfo, rng: Rng): CardId[] {
  const cards = Array.from(generateDeck(info));
  shuffleInPlace(cards, rng);
  return cards;
}

export interface Deal {
  /** holeCards[player] */
  holeCards: CardId[][];
  /** Every board card up to the final round. */
  boardCards: CardId[];
}

export function dealHoleAndBoardCards(info: GameInfo, rng: Rng): Deal {
  const deck = generateShuffledDeck(info, rng);
  let c = 0;
  const draw = (): CardId => {
    const card = deck[c++];
    if (card === undefined) throw new GameConfigError("Deck ran out while dealing.");
    return card;
  };

  const holeCards: CardId[][] = [];
  for (let p = 0; p < info.numPlayers; p++) {
    const hole: CardId[] = [];
    for (let i = 0; i < info.numHoleCards; i++) hole.push(draw());
    holeCards.push(hole);
  }

  const boardCards: CardId[] = [];
  const boardCount = totalBoardCards(info, info.numRounds - 1);
  for (let i = 0; i < boardCount; i++) boardCards.push(draw());

  return { holeCards, boardCards };
}
