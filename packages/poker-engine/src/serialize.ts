import { z } from "zod";
import { ChipsSchema } from "./gameInfo.js";
import { PokerEngineError } from "./errors.js";
import { MAX_NUM_ACTIONS, MAX_PLAYERS, MAX_ROUNDS, type Action, type GameState } from "./types.js";

const ActionSchema = z.union([
  z.literal("Fold").transform((): Action => ({ kind: "Fold" })),
  z.literal("Call").transform((): Action => ({ kind: "Call" })),
  z
    .object({ Raise: ChipsSchema })
    .strict()
    .transform((v): Action => ({ kind: "Raise", amount: v.Raise }))
]);

const PlayerSchema = z.number().int().nonnegative().lt(MAX_PLAYERS);

export const GameStateFileSchema = z
  .object({
    hand_id: z.number().int().nonnegative(),
    max_spent: ChipsSchema,
    min_no_limit_raise_to: ChipsSchema,
    spent: z.array(ChipsSchema).min(2).max(MAX_PLAYERS),
    stack_player: z.array(ChipsSchema).min(2).max(MAX_PLAYERS),
    sum_round_spent: z.array(z.array(ChipsSchema)).min(1).max(MAX_ROUNDS),
    action_log: z
      .array(z.array(z.object({ action: ActionSchema, player: PlayerSchema }).strict()).max(MAX_NUM_ACTIONS))
      .min(1)
      .max(MAX_ROUNDS),
    active_player: PlayerSchema,
    round: z.number().int().nonnegative().lt(MAX_ROUNDS),
    finished: z.boolean(),
    players_folded: z.array(z.boolean())
  })
  .strict();

export type GameStateFile = z.input<typeof GameStateFileSchema>;

function serializeAction(action: Action): GameStateFile["action_log"][number][number]["action"] {
  switch (action.kind) {
    case "Fold":
      return "Fold";
    case "Call":
      return "Call";
    case "Raise":
      return { Raise: action.amount.toString() };
  }
}

/** JSON-safe form of a state; chips become decimal strings. */
export function serializeGameState(state: GameState): GameStateFile {
  return {
    hand_id: state.handId,
    max_spent: state.maxSpent.toString(),
    min_no_limit_raise_to: state.minNoLimitRaiseTo.toString(),
    spent: state.spent.map(String),
    stack_player: state.stackPlayer.map(String),
    sum_round_spent: state.sumRoundSpent.map((r) => r.map(String)),
    action_log: state.actionLog.map((r) => r.map((rec) => ({ action: serializeAction(rec.action), player: rec.player }))),
    active_player: state.activePlayer,
    round: state.round,
    finished: state.finished,
    players_folded: state.playersFolded.slice()
  };
}

type ParsedStateFile = z.output<typeof GameStateFileSchema>;

function consistencyProblems(f: ParsedStateFile): string[] {
  const problems: string[] = [];
  let largest = 0n;
  f.spent.forEach((spent, p) => {
    const stack = f.stack_player[p] ?? 0n;
    if (spent > stack) problems.push(`spent[${p}] (${spent}) exceeds stack_player[${p}] (${stack})`);
    const ledger = f.sum_round_spent.reduce((sum, round) => sum + (round[p] ?? 0n), 0n);
    if (ledger !== spent) problems.push(`spent[${p}] (${spent}) differs from its round ledger total (${ledger})`);
    if (spent > largest) largest = spent;
  });
  if (f.max_spent !== largest) problems.push(`max_spent (${f.max_spent}) is not the largest spent (${largest})`);

  if (!f.finished) {
    const p = f.active_player;
    if (f.players_folded[p] === true) problems.push(`active player ${p} has folded`);
    const spent = f.spent[p];
    if (spent !== undefined && spent === f.stack_player[p]) problems.push(`active player ${p} is all-in`);
  }
  return problems;
}

/** Parses a serialized state, rejecting shapes and ledgers no transition could produce. */
export function parseGameState(raw: unknown): GameState {
  const parsed = GameStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PokerEngineError("MALFORMED_STATE", "Malformed game state.", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    });
  }
  const f = parsed.data;

  const numPlayers = f.spent.length;
  const numRounds = f.action_log.length;
  const shapeOk =
    f.stack_player.length === numPlayers &&
    f.players_folded.length === numPlayers &&
    f.sum_round_spent.length === numRounds &&
    f.sum_round_spent.every((r) => r.length === numPlayers) &&
    f.round < numRounds &&
    f.active_player < numPlayers &&
    f.action_log.every((r) => r.every((rec) => rec.player < numPlayers));
  if (!shapeOk) {
    throw new PokerEngineError("MALFORMED_STATE", "Game state arrays disagree on player or round count.", {
      numPlayers,
      numRounds
    });
  }

  const problems = consistencyProblems(f);
  if (problems.length > 0) {
    throw new PokerEngineError("MALFORMED_STATE", "Game state is inconsistent.", { problems });
  }

  return {
    handId: f.hand_id,
    maxSpent: f.max_spent,
    minNoLimitRaiseTo: f.min_no_limit_raise_to,
    spent: f.spent,
    stackPlayer: f.stack_player,
    sumRoundSpent: f.sum_round_spent,
    actionLog: f.action_log,
    activePlayer: f.active_player,
    round: f.round,
    finished: f.finished,
    playersFolded: f.players_folded
  };
}
