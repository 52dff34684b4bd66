import assert from "node:assert/strict";
import test from "node:test";
import {
  type AbstractRaise,
  type RaiseRoundConfig,
  ActionAbstraction,
  GameConfigError,
  abstractRaiseToReal,
  createGameState,
  legalAbstractActions
} from "../src/index.js";
import { call, fold, gamePath, loadGame, play, raise } from "./helpers.js";

const always: RaiseRoundConfig[] = Array.from({ length: 4 }, () => ({ kind: "Always" }));

test("actionAbstraction: loads raises from a config file", () => {
  const info = loadGame("holdem-nl-2p.json");
  const abs = ActionAbstraction.fromConfig(gamePath("abstractions/nl-pot-allin.json"), info);

  assert.equal(abs.possibleRaises.length, 3);
  assert.deepEqual(abs.possibleRaises[0], {
    raiseType: { kind: "PotRatio", ratio: 0.5 },
    roundConfig: Array.from({ length: 4 }, () => ({ kind: "Before", raises: 2 }))
  });
  assert.deepEqual(abs.possibleRaises[2]?.raiseType, { kind: "AllIn" });
});

test("actionAbstraction: pot-ratio and all-in raises become raise-to amounts", () => {
  const info = loadGame("holdem-nl-2p.json");
  const abs = ActionAbstraction.fromConfig(gamePath("abstractions/nl-pot-allin.json"), info);

  let s = createGameState(info, 1);
  assert.deepEqual(abs.getActions(info, s), [fold, call, raise(4n), raise(6n), raise(100n)]);

  s = play(info, s, [raise(4n)]);
  assert.deepEqual(abs.getActions(info, s), [fold, call, raise(8n), raise(12n), raise(100n)]);

  // Third raise of the round: the half-pot option has run out.
  s = play(info, s, [raise(8n)]);
  assert.deepEqual(legalAbstractActions(info, s, abs), [fold, call, raise(24n), raise(100n)]);
});

test("actionAbstraction: raises landing on the same amount are listed once", () => {
  const info = loadGame("holdem-nl-2p.json");
  const raises: AbstractRaise[] = [
    { raiseType: { kind: "Fixed", amount: 98n }, roundConfig: always },
    { raiseType: { kind: "AllIn" }, roundConfig: always }
  ];
  const abs = new ActionAbstraction(raises, info);
  assert.deepEqual(abs.getActions(info, createGameState(info, 1)), [fold, call, raise(100n)]);
});

test("actionAbstraction: raises that are not legal are dropped", () => {
  const info = loadGame("holdem-nl-2p.json");
  const s = createGameState(info, 1);
  const tooSmall: AbstractRaise = { raiseType: { kind: "Fixed", amount: 1n }, roundConfig: always };
  const tooBig: AbstractRaise = { raiseType: { kind: "Fixed", amount: 200n }, roundConfig: always };

  assert.equal(abstractRaiseToReal(info, s, tooSmall), null);
  assert.equal(abstractRaiseToReal(info, s, tooBig), null);
  assert.deepEqual(abstractRaiseToReal(info, s, { ...tooSmall, raiseType: { kind: "Fixed", amount: 2n } }), raise(4n));
});

test("actionAbstraction: round configs gate limit raises", () => {
  const info = loadGame("leduc.json");
  const abs = ActionAbstraction.fromConfig(gamePath("abstractions/leduc-fixed.json"), info);

  let s = createGameState(info, 1);
  assert.deepEqual(abs.getActions(info, s), [fold, call, raise(2n)]);

  s = play(info, s, [call, call]);
  assert.equal(s.round, 1);
  assert.deepEqual(abs.getActions(info, s), [fold, call, raise(4n)]);
});

test("actionAbstraction: a finished hand has no abstract raises", () => {
  const info = loadGame("leduc.json");
  const s = play(info, createGameState(info, 1), [fold]);
  assert.equal(s.finished, true);
  const allIn: AbstractRaise = { raiseType: { kind: "AllIn" }, roundConfig: [{ kind: "Always" }, { kind: "Always" }] };

  assert.equal(abstractRaiseToReal(info, s, allIn), null);
  assert.deepEqual(new ActionAbstraction([allIn], info).getActions(info, s), []);
});

test("actionAbstraction: round_config must cover every round", () => {
  const info = loadGame("holdem-nl-2p.json");
  assert.throws(
    () => ActionAbstraction.fromJson({ possible_raises: [{ raise_type: "AllIn", round_config: ["Always"] }] }, info),
    (e) =>
      e instanceof GameConfigError &&
      e.issues.length === 1 &&
      e.issues[0] === "possible_raises[0].round_config has 1 entries, expected 4"
  );
});

test("actionAbstraction: malformed raise types are rejected", () => {
  for (const raiseType of [{ PotRatio: -1 }, { Fixed: "ten" }, "Everything"]) {
    assert.throws(
      () => ActionAbstraction.fromJson({ possible_raises: [{ raise_type: raiseType, round_config: ["Always"] }] }),
      (e) => e instanceof GameConfigError && e.message.startsWith("Malformed action abstraction.")
    );
  }
});
