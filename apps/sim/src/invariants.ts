import { type Chips, type GameInfo, type GameState, MAX_NUM_ACTIONS } from "@handstate/poker-engine";

export function assertStateInvariants(info: GameInfo, state: GameState): void {
  let maxSpent = 0n;
  for (let p = 0; p < info.numPlayers; p++) {
    const spent = state.spent[p] ?? 0n;
    const stack = state.stackPlayer[p] ?? 0n;
    if (spent < 0n) throw new Error(`invariant: negative spend for player ${p}`);
    if (spent > stack) throw new Error(`invariant: player ${p} spent ${spent} with a stack of ${stack}`);
    if (spent > maxSpent) maxSpent = spent;

    let ledger = 0n;
    for (const round of state.sumRoundSpent) ledger += round[p] ?? 0n;
    if (ledger !== spent) {
      throw new Error(`invariant: round ledger ${ledger} disagrees with spend ${spent} for player ${p}`);
    }
  }
  if (maxSpent !== state.maxSpent) {
    throw new Error(`invariant: maxSpent=${state.maxSpent} but the largest spend is ${maxSpent}`);
  }

  state.actionLog.forEach((actions, round) => {
    if (actions.length > MAX_NUM_ACTIONS) throw new Error(`invariant: round ${round} holds ${actions.length} actions`);
  });

  const folded = state.playersFolded.filter(Boolean).length;
  if (folded >= info.numPlayers) throw new Error("invariant: every player folded");

  if (!state.finished) {
    const p = state.activePlayer;
    if (state.playersFolded[p]) throw new Error(`invariant: active player ${p} has folded`);
    if ((state.spent[p] ?? 0n) >= (state.stackPlayer[p] ?? 0n)) {
      throw new Error(`invariant: active player ${p} is all-in`);
    }
  }
}

// Split remainders are dropped, so a hand may lose a few chips but never create them.
export function assertPayoutInvariants(state: GameState, payouts: readonly Chips[]): void {
  let total = 0n;
  payouts.forEach((value, p) => {
    const spent = state.spent[p] ?? 0n;
    if (value < -spent) throw new Error(`invariant: player ${p} lost ${-value} but only committed ${spent}`);
    total += value;
  });

  const n = BigInt(payouts.length);
  if (total > 0n) throw new Error(`invariant: payouts create ${total} chips`);
  if (total <= -(n * n)) throw new Error(`invariant: payouts lose ${-total} chips`);
}
