import {
  type Action,
  type GameInfo,
  type GameState,
  applyAction,
  bundledGamePath,
  createGameInfo,
  expectState,
  loadGameInfo
} from "../src/index.js";

export const fold: Action = { kind: "Fold" };
export const call: Action = { kind: "Call" };
export function raise(amount: bigint): Action {
  return { kind: "Raise", amount };
}

export function gamePath(name: string): string {
  return bundledGamePath(name);
}

export function loadGame(name: string): GameInfo {
  return loadGameInfo(gamePath(name));
}

/** No-limit hold'em shaped game with the given stacks and blinds. */
export function noLimitGame(stacks: bigint[], blinds: bigint[], numRounds = 4): GameInfo {
  const numPlayers = stacks.length;
  const boards = [0, 3, 1, 1].slice(0, numRounds);
  return createGameInfo({
    startingStacks: stacks,
    blinds,
    raiseSizes: Array.from({ length: numRounds }, () => 0n),
    bettingType: "NoLimit",
    numPlayers,
    numRounds,
    maxRaises: Array.from({ length: numRounds }, () => 255),
    firstPlayer: Array.from({ length: numRounds }, (_, r) => (r === 0 ? 0 : 1 % numPlayers)),
    numSuits: 4,
    numRanks: 13,
    numHoleCards: 2,
    numBoardCards: boards
  });
}

export function play(info: GameInfo, state: GameState, actions: readonly Action[]): GameState {
  let s = state;
  for (const a of actions) s = expectState(applyAction(info, s, a));
  return s;
}
