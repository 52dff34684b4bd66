import "dotenv/config";
import { cardsToString, formatHandRank } from "@handstate/holdem-eval";
import { handRankForCards } from "@handstate/poker-engine";
import { loadSimConfig } from "./config.js";
import { log, logError } from "./log.js";
import { getScenarioById, getScenarios } from "./scenarios.js";
import { runSimulation } from "./sim.js";
import type { HandResult } from "./types.js";

function usage(): string {
  return [
    "Usage:",
    "  npm run sim -w apps/sim -- --list",
    "  npm run sim -w apps/sim -- <scenarioId>",
    "  npm run sim -w apps/sim -- run [--game <file>] [--seed <n>] [--hands <n>] [--policy calling-station|random] [--abstraction <file>]",
    "",
    "Scenarios:"
  ].join("\n");
}

function printScenarios(): void {
  console.log(usage());
  for (const s of getScenarios()) console.log(`  - ${s.id}: ${s.description}`);
}

function printHand(hand: HandResult): void {
  console.log(`Hand ${hand.handId}: board ${cardsToString(hand.boardCards) || "-"}`);
  for (const e of hand.events) {
    if (e.type === "ActionApplied") console.log(`  round ${e.round} P${e.playerId}: ${e.action}`);
    else if (e.type === "ActionReplaced") console.log(`  P${e.playerId} wanted ${e.wanted}: ${e.reason}`);
  }
  hand.payouts.forEach((v, p) => {
    const hole = hand.holeCards[p] ?? [];
    const folded = hand.finalState.playersFolded[p] ?? false;
    const rank = folded ? "folded" : formatHandRank(handRankForCards([...hole, ...hand.boardCards]));
    console.log(`  P${p} [${cardsToString(hole)}] ${rank}: ${v > 0n ? "+" : ""}${v}`);
  });
  console.log(`  fingerprint ${hand.fingerprint}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h") || args.includes("--list")) {
    printScenarios();
    return;
  }

  const [command, ...rest] = args;
  if (command === "run") {
    const config = loadSimConfig(process.env, rest);
    log(`game=${config.gameFile} policy=${config.policy} seed=${config.seed} hands=${config.hands}`);
    const res = runSimulation(config);
    const replaced = res.hands.reduce((n, h) => n + h.events.filter((e) => e.type === "ActionReplaced").length, 0);
    const showdowns = res.hands.filter((h) => h.finalState.playersFolded.filter(Boolean).length + 1 < res.info.numPlayers);
    log(`played ${res.hands.length} hands, ${showdowns.length} to showdown, ${replaced} replaced actions`);
    res.totals.forEach((v, p) => console.log(`P${p}: ${v > 0n ? "+" : ""}${v}`));
    return;
  }

  const scenario = command === undefined ? undefined : getScenarioById(command);
  if (!scenario) {
    console.error(`Unknown scenario: ${command ?? ""}\n`);
    printScenarios();
    process.exitCode = 2;
    return;
  }

  console.log(`Scenario: ${scenario.id}`);
  printHand(scenario.run());
}

main().catch((err) => {
  logError("sim failed", err);
  process.exit(1);
});
