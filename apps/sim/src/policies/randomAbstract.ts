import {
  type AbstractRaise,
  type Action,
  type GameInfo,
  type RaiseRoundConfig,
  type Rng,
  ActionAbstraction
} from "@handstate/poker-engine";
import type { Policy } from "../policy.js";
import type { PolicyView } from "../types.js";

/**
 * Raise menu used when no abstraction file is configured: half pot, pot and
 * all-in for NoLimit games, the round's fixed raise for Limit games.
 */
export function defaultAbstraction(info: GameInfo): ActionAbstraction {
  const everyRound: RaiseRoundConfig[] = Array.from({ length: info.numRounds }, () => ({ kind: "Always" }));

  if (info.bettingType === "NoLimit") {
    return new ActionAbstraction(
      [
        { raiseType: { kind: "PotRatio", ratio: 0.5 }, roundConfig: everyRound },
        { raiseType: { kind: "PotRatio", ratio: 1 }, roundConfig: everyRound },
        { raiseType: { kind: "AllIn" }, roundConfig: everyRound }
      ],
      info
    );
  }

  const raises: AbstractRaise[] = info.raiseSizes.map((amount, round) => ({
    raiseType: { kind: "Fixed", amount },
    roundConfig: Array.from({ length: info.numRounds }, (_, r): RaiseRoundConfig =>
      r === round ? { kind: "Always" } : { kind: "NotAllowed" }
    )
  }));
  return new ActionAbstraction(raises, info);
}

/** Picks uniformly among the abstraction's legal actions. */
export class RandomAbstract implements Policy {
  readonly name = "random";

  constructor(
    private readonly rng: Rng,
    private readonly abstraction: ActionAbstraction
  ) {}

  decide(view: PolicyView): Action {
    const actions = this.abstraction.getActions(view.info, view.state);
    const pick = actions[actions.length > 0 ? this.rng.int(0, actions.length) : 0];
    return pick ?? { kind: "Call" };
  }
}
