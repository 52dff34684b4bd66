import type { CardId } from "@handstate/holdem-eval";
import type { Chips, GameInfo, GameState, PlayerId } from "@handstate/poker-engine";

export type PolicyName = "calling-station" | "random";

export type SimConfig = {
  // A bundled game name ("leduc.json") or a path to a definition file.
  gameFile: string;
  abstractionFile: string | null;
  seed: number;
  hands: number;
  policy: PolicyName;
};

/** What a seat gets to see when it is asked for an action. */
export type PolicyView = {
  info: GameInfo;
  state: GameState;
  player: PlayerId;
  holeCards: readonly CardId[];
  /** Board cards revealed so far. */
  boardCards: readonly CardId[];
};

export type HandEvent =
  | { type: "HandStarted"; handId: number; holeCards: CardId[][] }
  | { type: "RoundStarted"; handId: number; round: number; board: CardId[] }
  | { type: "ActionApplied"; handId: number; round: number; playerId: PlayerId; action: string }
  | { type: "ActionReplaced"; handId: number; playerId: PlayerId; wanted: string; reason: string }
  | { type: "HandCompleted"; handId: number; payouts: Chips[] };

export type HandResult = {
  handId: number;
  holeCards: CardId[][];
  boardCards: CardId[];
  finalState: GameState;
  payouts: Chips[];
  events: HandEvent[];
  // sha256 over the event log; equal for replays of the same hand.
  fingerprint: string;
};

export type SimulationResult = {
  config: SimConfig;
  info: GameInfo;
  hands: HandResult[];
  /** Net chips per seat over all hands. */
  totals: Chips[];
};
