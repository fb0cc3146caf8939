// ─── Result Types ──────────────────────────────────────────────────
// Ephemeral, per-call results of validation, evaluation and round
// scoring. Discriminated so callers narrow before reading a value.

/** The validator stage that rejected an expression. */
export type ValidationStage =
  | "not_empty"
  | "complete"
  | "number_usage"
  | "root_usage"
  | "multiply_usage"
  | "disabled_operator";

export type ValidationResult =
  | { readonly isValid: true }
  | {
      readonly isValid: false;
      readonly stage: ValidationStage;
      /** Generic, user-facing message. */
      readonly errorMessage: string;
      /** Detailed reason naming the discrepancy, for logs and tests. */
      readonly reason: string;
    };

export type EvaluationErrorKind =
  | "empty_expression"
  | "incomplete_expression"
  | "negative_root"
  | "division_by_zero"
  | "internal";

export type EvaluationResult =
  | { readonly success: true; readonly value: number }
  | {
      readonly success: false;
      readonly errorKind: EvaluationErrorKind;
      readonly errorMessage: string;
    };

// ─── Round Result ──────────────────────────────────────────────────

export type RoundWinner = "player" | "ai" | "draw" | "invalid";

/** How one side's submission scored against the target. */
export interface SideResult {
  /** Rendered expression, or "-" when it failed. */
  readonly expression: string;
  /** Evaluated value; NaN when the submission failed. */
  readonly value: number;
  /** |value - target|; +Infinity when the submission failed. */
  readonly difference: number;
  /** Empty when the submission succeeded. */
  readonly error: string;
}

export interface RoundResult {
  readonly target: number;
  readonly bet: number;
  readonly player: SideResult;
  readonly ai: SideResult;
  readonly winner: RoundWinner;
  readonly playerScoreChange: number;
  readonly aiScoreChange: number;
}
