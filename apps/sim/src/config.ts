import type { PolicyName, SimConfig } from "./types.js";

const POLICIES: readonly PolicyName[] = ["calling-station", "random"];

function parseIntEnv(v: string | undefined): number | undefined {
  if (!v) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n) || !Number.isInteger(n)) return undefined;
  return n;
}

function parsePolicy(v: string): PolicyName | undefined {
  return POLICIES.find((p) => p === v);
}

export function createDefaultConfig(seed: number): SimConfig {
  return {
    gameFile: "holdem-nl-2p.json",
    abstractionFile: null,
    seed,
    hands: 100,
    policy: "random"
  };
}

// `--key value` pairs; later flags win.
function parseFlags(argv: readonly string[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined || !arg.startsWith("--")) continue;
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) throw new Error(`${arg} needs a value`);
    flags.set(arg.slice(2), value);
    i++;
  }
  return flags;
}

/** Environment first (SIM_GAME, SIM_SEED, SIM_HANDS, SIM_POLICY, SIM_ABSTRACTION), then CLI flags. */
export function loadSimConfig(env: NodeJS.ProcessEnv = process.env, argv: readonly string[] = []): SimConfig {
  const defaults = createDefaultConfig(1);
  const flags = parseFlags(argv);
  const pick = (flag: string, key: string): string | undefined => {
    const v = (flags.get(flag) ?? env[key] ?? "").trim();
    return v || undefined;
  };

  const seedRaw = pick("seed", "SIM_SEED");
  const seed = seedRaw === undefined ? defaults.seed : parseIntEnv(seedRaw);
  if (seed === undefined || seed < 0) throw new Error(`SIM_SEED must be a non-negative integer, got ${seedRaw}`);

  const handsRaw = pick("hands", "SIM_HANDS");
  const hands = handsRaw === undefined ? defaults.hands : parseIntEnv(handsRaw);
  if (hands === undefined || hands < 1) throw new Error(`SIM_HANDS must be a positive integer, got ${handsRaw}`);

  const policyRaw = pick("policy", "SIM_POLICY") ?? defaults.policy;
  const policy = parsePolicy(policyRaw);
  if (!policy) throw new Error(`SIM_POLICY must be one of ${POLICIES.join(", ")}, got ${policyRaw}`);

  return {
    gameFile: pick("game", "SIM_GAME") ?? defaults.gameFile,
    abstractionFile: pick("abstraction", "SIM_ABSTRACTION") ?? defaults.abstractionFile,
    seed,
    hands,
    policy
  };
}
