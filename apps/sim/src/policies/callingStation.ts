import type { Action } from "@handstate/poker-engine";
import type { Policy } from "../policy.js";

// Never folds, never raises. Call doubles as check when nothing is owed.
export class CallingStation implements Policy {
  readonly name = "calling-station";

  decide(): Action {
    return { kind: "Call" };
  }
}
