export type Chips = bigint;

/** Seat index, 0-based. */
export type PlayerId = number;

export const MAX_PLAYERS = 22;
export const MAX_ROUNDS = 4;
export const MAX_NUM_ACTIONS = 32; // per round
export const MAX_BOARD_CARDS = 7;
export const MAX_HOLE_CARDS = 5;

export type BettingType = "Limit" | "NoLimit";

/**
 * Raise amounts are raise-to totals under NoLimit and the fixed round
 * increment under Limit.
 */
export type Action = { kind: "Fold" } | { kind: "Call" } | { kind: "Raise"; amount: Chips };

export interface GameInfo {
  /** One entry per player. */
  readonly startingStacks: readonly Chips[];
  /** One entry per player; posted before round 0. */
  readonly blinds: readonly Chips[];
  /** One entry per round; the fixed raise increment for Limit games. */
  readonly raiseSizes: readonly Chips[];
  readonly bettingType: BettingType;
  readonly numPlayers: number;
  readonly numRounds: number;
  /** One entry per round. */
  readonly maxRaises: readonly number[];
  /** One entry per round. */
  readonly firstPlayer: readonly PlayerId[];
  readonly numSuits: number;
  readonly numRanks: number;
  readonly numHoleCards: number;
  /** Board cards revealed at the start of each round. */
  readonly numBoardCards: readonly number[];
}

export interface ActionRecord {
  readonly action: Action;
  readonly player: PlayerId;
}

export interface GameState {
  readonly handId: number;

  // Largest total commitment so far; the amount a call has to match.
  readonly maxSpent: Chips;
  readonly minNoLimitRaiseTo: Chips;

  /** Total chips committed per player over the whole hand. */
  readonly spent: readonly Chips[];
  /** Starting stack per player; the all-in ceiling for `spent`. */
  readonly stackPlayer: readonly Chips[];
  /** sumRoundSpent[round][player]: chips committed during that round. */
  readonly sumRoundSpent: readonly (readonly Chips[])[];
  /** actionLog[round]: at most MAX_NUM_ACTIONS entries. */
  readonly actionLog: readonly (readonly ActionRecord[])[];

  readonly activePlayer: PlayerId;
  readonly round: number;
  readonly finished: boolean;
  readonly playersFolded: readonly boolean[];
}

export type TransitionErrorCode = "HAND_FINISHED" | "ACTION_LOG_FULL" | "INVALID_ACTION";

export type TransitionResult =
  | { ok: true; state: GameState }
  | { ok: false; code: TransitionErrorCode; message: string };

/** Inclusive raise-to bounds under NoLimit. */
export interface RaiseRange {
  readonly min: Chips;
  readonly max: Chips;
}
