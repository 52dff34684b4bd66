export * from "./types.js";
export { GameConfigError, PokerEngineError, type PokerEngineErrorCode } from "./errors.js";
export { log, logError, logWarn } from "./log.js";
export { Mulberry32, type Rng, shuffleInPlace } from "./rng.js";
export {
  type Deal,
  type GameInfoFile,
  ChipsSchema,
  bundledGamePath,
  GameInfoFileSchema,
  createGameInfo,
  dealHoleAndBoardCards,
  deckSize,
  generateDeck,
  generateShuffledDeck,
  loadGameInfo,
  parseGameInfo,
  toGameInfoFile,
  totalBoardCards
} from "./gameInfo.js";
export {
  applyAction,
  createGameState,
  currentPlayer,
  currentRound,
  expectState,
  formatAction,
  hasFolded,
  isFinished,
  isValidAction,
  numActivePlayers,
  numCalled,
  numFolded,
  numRaises,
  playerSpent,
  playerStack,
  potTotal,
  raiseRange,
  roundActions
} from "./engine.js";
export { type HandEvaluator, getPayout, getPayouts, handRankForCards } from "./payout.js";
export {
  type AbstractRaise,
  type AbstractRaiseType,
  type RaiseRoundConfig,
  ActionAbstraction,
  ActionAbstractionFileSchema,
  abstractRaiseToReal,
  legalAbstractActions
} from "./actionAbstraction.js";
export {
  type BucketId,
  type RoundBuckets,
  type RoundBucketsKind,
  CardAbstraction,
  CardAbstractionFileSchema,
  createRoundBuckets,
  getRoundBucket
} from "./cardAbstraction.js";
export { type GameStateFile, GameStateFileSchema, parseGameState, serializeGameState } from "./serialize.js";
