import { createHash } from "node:crypto";
import { isAbsolute, resolve } from "node:path";
import {
  type Chips,
  type Deal,
  type GameInfo,
  type GameState,
  type HandEvaluator,
  ActionAbstraction,
  Mulberry32,
  type Rng,
  applyAction,
  bundledGamePath,
  createGameState,
  dealHoleAndBoardCards,
  expectState,
  formatAction,
  getPayouts,
  loadGameInfo,
  totalBoardCards
} from "@handstate/poker-engine";
import { assertPayoutInvariants, assertStateInvariants } from "./invariants.js";
import { logWarn } from "./log.js";
import { CallingStation } from "./policies/callingStation.js";
import { RandomAbstract, defaultAbstraction } from "./policies/randomAbstract.js";
import type { Policy } from "./policy.js";
import type { HandEvent, HandResult, SimConfig, SimulationResult } from "./types.js";

/**
 * Absolute and "./"-relative paths are used as given; anything else names a
 * file under the engine's bundled games/ directory ("leduc.json",
 * "abstractions/leduc-fixed.json").
 */
export function resolveGamePath(file: string): string {
  if (isAbsolute(file) || file.startsWith(".")) return resolve(file);
  return bundledGamePath(file);
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

export function fingerprint(events: readonly HandEvent[]): string {
  return sha256Hex(JSON.stringify(events, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)));
}

function visibleBoard(info: GameInfo, deal: Deal, round: number): number[] {
  return deal.boardCards.slice(0, totalBoardCards(info, round));
}

/**
 * Plays one hand to the end with `policy` choosing for every seat. An illegal
 * choice is replaced by a call and recorded as an ActionReplaced event.
 */
export function playHand(
  info: GameInfo,
  handId: number,
  policy: Policy,
  deal: Deal,
  evaluate?: HandEvaluator
): HandResult {
  const events: HandEvent[] = [{ type: "HandStarted", handId, holeCards: deal.holeCards.map((h) => h.slice()) }];
  let state: GameState = createGameState(info, handId);
  assertStateInvariants(info, state);

  while (!state.finished) {
    const player = state.activePlayer;
    const round = state.round;
    const wanted = policy.decide({
      info,
      state,
      player,
      holeCards: deal.holeCards[player] ?? [],
      boardCards: visibleBoard(info, deal, round)
    });

    let result = applyAction(info, state, wanted);
    let applied = wanted;
    if (!result.ok && result.code === "INVALID_ACTION") {
      logWarn(`hand ${handId}: ${policy.name} chose ${formatAction(wanted)} for player ${player}; calling instead`);
      events.push({ type: "ActionReplaced", handId, playerId: player, wanted: formatAction(wanted), reason: result.message });
      applied = { kind: "Call" };
      result = applyAction(info, state, applied);
    }
    state = expectState(result);
    assertStateInvariants(info, state);

    events.push({ type: "ActionApplied", handId, round, playerId: player, action: formatAction(applied) });
    if (!state.finished && state.round !== round) {
      events.push({ type: "RoundStarted", handId, round: state.round, board: visibleBoard(info, deal, state.round) });
    }
  }

  const payouts = getPayouts(info, state, deal.boardCards, deal.holeCards, evaluate);
  assertPayoutInvariants(state, payouts);
  events.push({ type: "HandCompleted", handId, payouts: payouts.slice() });

  return {
    handId,
    holeCards: deal.holeCards,
    boardCards: deal.boardCards,
    finalState: state,
    payouts,
    events,
    fingerprint: fingerprint(events)
  };
}

export function createPolicy(config: SimConfig, info: GameInfo, rng: Rng): Policy {
  switch (config.policy) {
    case "calling-station":
      return new CallingStation();
    case "random": {
      const abstraction =
        config.abstractionFile === null
          ? defaultAbstraction(info)
          : ActionAbstraction.fromConfig(resolveGamePath(config.abstractionFile), info);
      return new RandomAbstract(rng, abstraction);
    }
  }
}

/** Plays `config.hands` independent hands from the starting stacks, dealt from one seeded source. */
export function runSimulation(config: SimConfig): SimulationResult {
  const info = loadGameInfo(resolveGamePath(config.gameFile));
  const rng = new Mulberry32(config.seed);
  const policy = createPolicy(config, info, rng);

  const hands: HandResult[] = [];
  const totals: Chips[] = Array.from({ length: info.numPlayers }, () => 0n);
  for (let handId = 1; handId <= config.hands; handId++) {
    const hand = playHand(info, handId, policy, dealHoleAndBoardCards(info, rng));
    hand.payouts.forEach((v, p) => {
      totals[p] = (totals[p] ?? 0n) + v;
    });
    hands.push(hand);
  }

  return { config, info, hands, totals };
}
