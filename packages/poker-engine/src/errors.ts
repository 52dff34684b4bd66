export type PokerEngineErrorCode =
  | "HAND_FINISHED"
  | "HAND_NOT_FINISHED"
  | "ACTION_LOG_FULL"
  | "INVALID_ACTION"
  | "INVALID_PLAYER"
  | "MALFORMED_STATE"
  | "INVARIANT";

/** Precondition violations: a caller or engine bug, never a game-rule outcome. */
export class PokerEngineError extends Error {
  readonly code: PokerEngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: PokerEngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "PokerEngineError";
    this.code = code;
    this.details = details;
  }
}

/** Malformed or inconsistent game configuration. Not recoverable. */
export class GameConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "GameConfigError";
    this.issues = issues;
  }
}
