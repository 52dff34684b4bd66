import type { Action } from "@handstate/poker-engine";
import type { Policy } from "../policy.js";

/** Plays the given actions in order, whoever is seated, then calls. */
export class Scripted implements Policy {
  readonly name = "scripted";
  private next = 0;

  constructor(private readonly actions: readonly Action[]) {}

  decide(): Action {
    const action = this.actions[this.next];
    if (action === undefined) return { kind: "Call" };
    this.next += 1;
    return action;
  }
}
