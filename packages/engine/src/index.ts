// ─── @math-high-low/engine ─────────────────────────────────────────
// Pure TypeScript game engine. No framework dependencies.
// Card helpers, hand and expression model, validator, evaluator,
// best-expression search, dealing and round scoring.

export * from "./engine/index.js";
export * from "./deck/index.js";
export type {
  Card,
  CardType,
  NumberCard,
  OperatorCard,
  SpecialCard,
  OperatorKind,
  SpecialKind,
  GameConfig,
  ValidationResult,
  ValidationStage,
  EvaluationResult,
  EvaluationErrorKind,
  RoundResult,
  RoundWinner,
  SideResult,
} from "@math-high-low/schema";
