import { PokerEngineError } from "./errors.js";
import { logWarn } from "./log.js";
import {
  MAX_NUM_ACTIONS,
  type Action,
  type ActionRecord,
  type Chips,
  type GameInfo,
  type GameState,
  type PlayerId,
  type RaiseRange,
  type TransitionErrorCode,
  type TransitionResult
} from "./types.js";

// Mutable working copy; only ever built by cloning, then handed out as a GameState.
interface DraftState {
  handId: number;
  maxSpent: Chips;
  minNoLimitRaiseTo: Chips;
  spent: Chips[];
  stackPlayer: Chips[];
  sumRoundSpent: Chips[][];
  actionLog: ActionRecord[][];
  activePlayer: PlayerId;
  round: number;
  finished: boolean;
  playersFolded: boolean[];
}

function cloneGameState(state: GameState): DraftState {
  return {
    ...state,
    spent: state.spent.slice(),
    stackPlayer: state.stackPlayer.slice(),
    sumRoundSpent: state.sumRoundSpent.map((r) => r.slice()),
    actionLog: state.actionLog.map((r) => r.slice()),
    playersFolded: state.playersFolded.slice()
  };
}

function numPlayersOf(state: GameState): number {
  return state.spent.length;
}

function entry<T>(values: readonly T[], index: number, what: string): T {
  const v = values[index];
  if (v === undefined) {
    throw new PokerEngineError("INVALID_PLAYER", `No ${what} entry at index ${index}.`, { index });
  }
  return v;
}

function isAllIn(state: GameState, player: PlayerId): boolean {
  return entry(state.spent, player, "spent") >= entry(state.stackPlayer, player, "stack");
}

function canAct(state: GameState, player: PlayerId): boolean {
  return !entry(state.playersFolded, player, "folded") && !isAllIn(state, player);
}

// First seat at or after `from` (wrapping) that can still act.
function seatFrom(state: GameState, from: PlayerId): PlayerId | null {
  const n = numPlayersOf(state);
  for (let offset = 0; offset < n; offset++) {
    const p = (from + offset) % n;
    if (canAct(state, p)) return p;
  }
  return null;
}

function nextPlayer(state: GameState, after: PlayerId): PlayerId | null {
  return seatFrom(state, (after + 1) % numPlayersOf(state));
}

function maxChips(values: readonly Chips[]): Chips {
  let m = 0n;
  for (const v of values) if (v > m) m = v;
  return m;
}

export function createGameState(info: GameInfo, handId: number): GameState {
  const spent = info.blinds.slice();
  const sumRoundSpent = Array.from({ length: info.numRounds }, (_, r) =>
    r === 0 ? info.blinds.slice() : Array.from({ length: info.numPlayers }, () => 0n)
  );
  const maxSpent = maxChips(spent);

  let minNoLimitRaiseTo = 0n;
  if (info.bettingType === "NoLimit") minNoLimitRaiseTo = maxSpent > 0n ? maxSpent * 2n : 1n;

  const state: DraftState = {
    handId,
    maxSpent,
    minNoLimitRaiseTo,
    spent,
    stackPlayer: info.startingStacks.slice(),
    sumRoundSpent,
    actionLog: Array.from({ length: info.numRounds }, (): ActionRecord[] => []),
    activePlayer: entry(info.firstPlayer, 0, "firstPlayer"),
    round: 0,
    finished: false,
    playersFolded: Array.from({ length: info.numPlayers }, () => false)
  };

  // A blind can put its poster all-in; the first seat must still be able to act.
  const first = seatFrom(state, state.activePlayer);
  if (first === null) {
    state.finished = true;
    state.round = info.numRounds - 1;
  } else {
    state.activePlayer = first;
  }
  return state;
}

export function isFinished(state: GameState): boolean {
  return state.finished;
}

export function currentPlayer(state: GameState): PlayerId {
  if (state.finished) {
    throw new PokerEngineError("HAND_FINISHED", "state is finished so there is no active player", {
      handId: state.handId
    });
  }
  return state.activePlayer;
}

export function currentRound(state: GameState): number {
  return state.round;
}

export function hasFolded(state: GameState, player: PlayerId): boolean {
  return entry(state.playersFolded, player, "folded");
}

export function playerStack(state: GameState, player: PlayerId): Chips {
  return entry(state.stackPlayer, player, "stack");
}

export function playerSpent(state: GameState, player: PlayerId): Chips {
  return entry(state.spent, player, "spent");
}

export function potTotal(state: GameState): Chips {
  let total = 0n;
  for (const s of state.spent) total += s;
  return total;
}

export function roundActions(state: GameState, round: number = state.round): readonly ActionRecord[] {
  return state.actionLog[round] ?? [];
}

/** Players neither folded nor all-in. */
export function numActivePlayers(state: GameState): number {
  let count = 0;
  for (let p = 0; p < numPlayersOf(state); p++) if (canAct(state, p)) count++;
  return count;
}

export function numFolded(state: GameState): number {
  return state.playersFolded.filter(Boolean).length;
}

/**
 * Callers since the last raise of the current round, plus that raiser,
 * counting only players who still have chips behind.
 */
export function numCalled(state: GameState): number {
  const actions = roundActions(state);
  let count = 0;
  for (let i = actions.length - 1; i >= 0; i--) {
    const rec = entry(actions, i, "action");
    if (rec.action.kind === "Fold") continue;
    if (!isAllIn(state, rec.player)) count++;
    if (rec.action.kind === "Raise") return count;
  }
  return count;
}

export function numRaises(state: GameState): number {
  return roundActions(state).filter((rec) => rec.action.kind === "Raise").length;
}

/** NoLimit raise-to bounds for the active player, or null when no raise is possible. */
export function raiseRange(info: GameInfo, state: GameState): RaiseRange | null {
  if (state.finished) return null;
  if (numRaises(state) >= entry(info.maxRaises, state.round, "maxRaises")) return null;

  const pending = roundActions(state).length + info.numPlayers;
  if (pending > MAX_NUM_ACTIONS) {
    logWarn(`closing raises: ${pending} possible actions exceed ${MAX_NUM_ACTIONS} for round ${state.round}`);
    return null;
  }

  if (numActivePlayers(state) <= 1) return null;

  if (info.bettingType === "Limit") {
    logWarn("raiseRange called for a Limit game");
    return null;
  }

  const stack = playerStack(state, state.activePlayer);
  if (stack < state.minNoLimitRaiseTo) {
    // Short stack: an all-in raise is the only size, if it raises at all.
    if (state.maxSpent >= stack) return null;
    return { min: stack, max: stack };
  }
  return { min: state.minNoLimitRaiseTo, max: stack };
}

export function isValidAction(info: GameInfo, state: GameState, action: Action): boolean {
  if (state.finished) return false;
  const player = state.activePlayer;

  switch (action.kind) {
    case "Fold":
      return !isAllIn(state, player);
    case "Call":
      return true;
    case "Raise": {
      if (numRaises(state) >= entry(info.maxRaises, state.round, "maxRaises")) return false;
      if (info.bettingType === "Limit") {
        return (
          action.amount === entry(info.raiseSizes, state.round, "raiseSizes") &&
          playerStack(state, player) > state.maxSpent
        );
      }
      const range = raiseRange(info, state);
      return range !== null && action.amount >= range.min && action.amount <= range.max;
    }
  }
}

function commit(state: DraftState, player: PlayerId, total: Chips): void {
  const delta = total - entry(state.spent, player, "spent");
  const roundLedger = entry(state.sumRoundSpent, state.round, "round ledger");
  state.spent[player] = total;
  roundLedger[player] = entry(roundLedger, player, "round ledger") + delta;
}

function startNextRound(info: GameInfo, state: DraftState): void {
  state.round += 1;

  let bigBlind = 1n;
  for (const b of info.blinds) if (b > bigBlind) bigBlind = b;
  state.minNoLimitRaiseTo = bigBlind + state.maxSpent;

  const first = seatFrom(state, entry(info.firstPlayer, state.round, "firstPlayer"));
  if (first === null) {
    throw new PokerEngineError("INVARIANT", "round started with no player able to act", {
      handId: state.handId,
      round: state.round
    });
  }
  state.activePlayer = first;
}

function fail(code: TransitionErrorCode, message: string): TransitionResult {
  return { ok: false, code, message };
}

/** Returns the state after `action`; `state` itself is never modified. */
export function applyAction(info: GameInfo, state: GameState, action: Action): TransitionResult {
  if (state.finished) return fail("HAND_FINISHED", "cannot apply action to finished state");

  const round = state.round;
  if (roundActions(state, round).length >= MAX_NUM_ACTIONS) {
    return fail("ACTION_LOG_FULL", `round ${round} already holds ${MAX_NUM_ACTIONS} actions`);
  }

  if (!isValidAction(info, state, action)) {
    return fail("INVALID_ACTION", `${formatAction(action)} is not valid for player ${state.activePlayer}`);
  }

  const s = cloneGameState(state);
  const player = state.activePlayer;
  entry(s.actionLog, round, "action log").push({ action, player });

  switch (action.kind) {
    case "Fold":
      s.playersFolded[player] = true;
      break;
    case "Call": {
      // A call never exceeds the caller's own stack; that is how all-in by call is represented.
      const stack = playerStack(s, player);
      commit(s, player, s.maxSpent > stack ? stack : s.maxSpent);
      break;
    }
    case "Raise": {
      if (info.bettingType === "NoLimit") {
        const lastRaiseTo = action.amount * 2n - s.maxSpent;
        if (lastRaiseTo > s.minNoLimitRaiseTo) s.minNoLimitRaiseTo = lastRaiseTo;
        s.maxSpent = action.amount;
      } else {
        const raised = s.maxSpent + entry(info.raiseSizes, round, "raiseSizes");
        const stack = playerStack(s, player);
        s.maxSpent = raised > stack ? stack : raised;
      }
      commit(s, player, s.maxSpent);
      break;
    }
  }

  const next = nextPlayer(s, player);
  if (next !== null) s.activePlayer = next;

  if (numFolded(s) + 1 >= info.numPlayers) {
    s.finished = true;
  } else if (numCalled(s) >= numActivePlayers(s)) {
    if (numActivePlayers(s) > 1) {
      if (s.round + 1 < info.numRounds) {
        startNextRound(info, s);
      } else {
        s.finished = true;
      }
    } else {
      // Nobody left to bet against: run the board out to showdown.
      s.finished = true;
      s.round = info.numRounds - 1;
    }
  }

  return { ok: true, state: s };
}

/** Unwraps a transition that the caller knows to be legal. */
export function expectState(result: TransitionResult): GameState {
  if (!result.ok) throw new PokerEngineError(result.code, result.message);
  return result.state;
}

export function formatAction(action: Action): string {
  switch (action.kind) {
    case "Fold":
      return "fold";
    case "Call":
      return "call";
    case "Raise":
      return `raise ${action.amount}`;
  }
}
