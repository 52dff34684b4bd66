export * from "./types.js";
export type { Policy } from "./policy.js";
export { CallingStation } from "./policies/callingStation.js";
export { RandomAbstract, defaultAbstraction } from "./policies/randomAbstract.js";
export { Scripted } from "./policies/scripted.js";
export { createDefaultConfig, loadSimConfig } from "./config.js";
export { assertPayoutInvariants, assertStateInvariants } from "./invariants.js";
export { createPolicy, fingerprint, playHand, resolveGamePath, runSimulation, sha256Hex } from "./sim.js";
export { type Scenario, getScenarioById, getScenarios } from "./scenarios.js";
