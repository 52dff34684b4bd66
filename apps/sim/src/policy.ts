import type { Action } from "@handstate/poker-engine";
import type { PolicyView } from "./types.js";

export interface Policy {
  readonly name: string;
  decide(view: PolicyView): Action;
}
