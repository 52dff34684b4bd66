import { readFileSync } from "node:fs";
import { z } from "zod";
import { isValidAction, numRaises, playerSpent, playerStack, potTotal } from "./engine.js";
import { GameConfigError } from "./errors.js";
import { ChipsSchema } from "./gameInfo.js";
import type { Action, Chips, GameInfo, GameState } from "./types.js";

export type AbstractRaiseType =
  | { kind: "AllIn" }
  // Raise to maxSpent + floor(ratio * (pot + toCall)), a pot-sized raise when
  // ratio is 1. Not maxSpent * ratio.
  | { kind: "PotRatio"; ratio: number }
  // NoLimit: raise to the current bet plus `amount`. Limit: the fixed raise itself.
  | { kind: "Fixed"; amount: Chips };

export type RaiseRoundConfig =
  | { kind: "NotAllowed" }
  | { kind: "Always" }
  // Allowed while fewer than `raises` raises were made this round.
  | { kind: "Before"; raises: number };

export interface AbstractRaise {
  readonly raiseType: AbstractRaiseType;
  /** One entry per round. */
  readonly roundConfig: readonly RaiseRoundConfig[];
}

const RaiseTypeSchema = z.union([
  z.literal("AllIn").transform((): AbstractRaiseType => ({ kind: "AllIn" })),
  z
    .object({ PotRatio: z.number().positive().finite() })
    .strict()
    .transform((v): AbstractRaiseType => ({ kind: "PotRatio", ratio: v.PotRatio })),
  z
    .object({ Fixed: ChipsSchema })
    .strict()
    .transform((v): AbstractRaiseType => ({ kind: "Fixed", amount: v.Fixed }))
]);

const RoundConfigSchema = z.union([
  z.literal("NotAllowed").transform((): RaiseRoundConfig => ({ kind: "NotAllowed" })),
  z.literal("Always").transform((): RaiseRoundConfig => ({ kind: "Always" })),
  z
    .object({ Before: z.number().int().nonnegative() })
    .strict()
    .transform((v): RaiseRoundConfig => ({ kind: "Before", raises: v.Before }))
]);

export const ActionAbstractionFileSchema = z
  .object({
    possible_raises: z.array(
      z
        .object({
          raise_type: RaiseTypeSchema,
          round_config: z.array(RoundConfigSchema)
        })
        .strict()
        .transform((v): AbstractRaise => ({ raiseType: v.raise_type, roundConfig: v.round_config }))
    )
  })
  .strict();

function raiseAllowed(config: RaiseRoundConfig | undefined, raisesSoFar: number): boolean {
  if (config === undefined) return false;
  switch (config.kind) {
    case "Always":
      return true;
    case "Before":
      return config.raises > raisesSoFar;
    case "NotAllowed":
      return false;
  }
}

function raiseTarget(info: GameInfo, state: GameState, raiseType: AbstractRaiseType): Chips {
  const player = state.activePlayer;
  switch (raiseType.kind) {
    case "AllIn":
      return playerStack(state, player);
    case "Fixed":
      return info.bettingType === "NoLimit" ? state.maxSpent + raiseType.amount : raiseType.amount;
    case "PotRatio": {
      const toCall = state.maxSpent - playerSpent(state, player);
      const potAfterCall = potTotal(state) + toCall;
      return state.maxSpent + BigInt(Math.floor(raiseType.ratio * Number(potAfterCall)));
    }
  }
}

/** The concrete raise for an abstract one, or null when the round forbids it or it is not legal here. */
export function abstractRaiseToReal(info: GameInfo, state: GameState, raise: AbstractRaise): Action | null {
  if (state.finished) return null;
  if (!raiseAllowed(raise.roundConfig[state.round], numRaises(state))) return null;

  const action: Action = { kind: "Raise", amount: raiseTarget(info, state, raise.raiseType) };
  return isValidAction(info, state, action) ? action : null;
}

export class ActionAbstraction {
  readonly possibleRaises: readonly AbstractRaise[];

  constructor(possibleRaises: readonly AbstractRaise[], info?: GameInfo) {
    if (info) {
      const issues: string[] = [];
      possibleRaises.forEach((r, i) => {
        if (r.roundConfig.length !== info.numRounds) {
          issues.push(
            `possible_raises[${i}].round_config has ${r.roundConfig.length} entries, expected ${info.numRounds}`
          );
        }
      });
      if (issues.length > 0) throw new GameConfigError("Action abstraction does not fit the game.", issues);
    }
    this.possibleRaises = possibleRaises.slice();
  }

  static fromJson(raw: unknown, info?: GameInfo): ActionAbstraction {
    const parsed = ActionAbstractionFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GameConfigError(
        "Malformed action abstraction.",
        parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }
    return new ActionAbstraction(parsed.data.possible_raises, info);
  }

  static fromConfig(path: string, info?: GameInfo): ActionAbstraction {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GameConfigError(`Failed to read action abstraction ${path}: ${reason}`);
    }
    return ActionAbstraction.fromJson(raw, info);
  }

  /** Fold and call when legal, then each distinct legal concrete raise in configuration order. */
  getActions(info: GameInfo, state: GameState): Action[] {
    const actions: Action[] = [];
    if (isValidAction(info, state, { kind: "Fold" })) actions.push({ kind: "Fold" });
    if (isValidAction(info, state, { kind: "Call" })) actions.push({ kind: "Call" });

    const seen = new Set<Chips>();
    for (const raise of this.possibleRaises) {
      const action = abstractRaiseToReal(info, state, raise);
      if (action === null || action.kind !== "Raise" || seen.has(action.amount)) continue;
      seen.add(action.amount);
      actions.push(action);
    }
    return actions;
  }
}

export function legalAbstractActions(info: GameInfo, state: GameState, abstraction: ActionAbstraction): Action[] {
  return abstraction.getActions(info, state);
}
