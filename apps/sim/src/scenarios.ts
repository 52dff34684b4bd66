import { cardsFromString } from "@handstate/holdem-eval";
import { type Action, type Deal, type GameInfo, createGameInfo, loadGameInfo } from "@handstate/poker-engine";
import { CallingStation } from "./policies/callingStation.js";
import { Scripted } from "./policies/scripted.js";
import { playHand, resolveGamePath } from "./sim.js";
import type { HandResult } from "./types.js";

export type Scenario = {
  id: string;
  description: string;
  run: () => HandResult;
};

const fold: Action = { kind: "Fold" };
const call: Action = { kind: "Call" };
const raiseTo = (amount: bigint): Action => ({ kind: "Raise", amount });

function deal(holes: string[], board: string): Deal {
  return { holeCards: holes.map((h) => cardsFromString(h)), boardCards: cardsFromString(board) };
}

// Three-handed no-limit hold'em; seat 0 opens, seats 1 and 2 post 1 and 2.
function threeHanded(stacks: bigint[]): GameInfo {
  return createGameInfo({
    startingStacks: stacks,
    blinds: [0n, 1n, 2n],
    raiseSizes: [0n, 0n, 0n, 0n],
    bettingType: "NoLimit",
    numPlayers: 3,
    numRounds: 4,
    maxRaises: [255, 255, 255, 255],
    firstPlayer: [0, 1, 1, 1],
    numSuits: 4,
    numRanks: 13,
    numHoleCards: 2,
    numBoardCards: [0, 3, 1, 1]
  });
}

export function getScenarios(): Scenario[] {
  return [
    {
      id: "heads-up-call-down",
      description: "heads-up no-limit, blinds 1/2, both players call every round; the pair of aces wins the 2-chip blind",
      run: () =>
        playHand(
          loadGameInfo(resolveGamePath("holdem-nl-2p.json")),
          1,
          new CallingStation(),
          deal(["As Ad", "7c 4d"], "2c 3d 8h 9s Kc")
        )
    },
    {
      id: "fold-after-raise",
      description: "three players, seat 0 raises to 10, the small blind folds, the big blind calls down and loses",
      run: () =>
        playHand(
          threeHanded([100n, 100n, 100n]),
          2,
          new Scripted([raiseTo(10n), fold, call]),
          deal(["As Ad", "Ks Kd", "7c 4d"], "2c 3d 8h 9s Kc")
        )
    },
    {
      id: "side-pot",
      description: "short stack all-in for 5 holds the best hand; the 20-chip callers contest the side pot",
      run: () =>
        playHand(
          threeHanded([5n, 20n, 20n]),
          3,
          new Scripted([raiseTo(5n), raiseTo(20n), call]),
          deal(["As Ad", "Ks Kd", "Qs 3d"], "2c 7d 9h Js 4c")
        )
    }
  ];
}

export function getScenarioById(id: string): Scenario | undefined {
  return getScenarios().find((s) => s.id === id);
}
