export {
  numberCard,
  operatorCard,
  specialCard,
  cloneCard,
  cardDisplayText,
  cardType,
  isSameCardType,
  operatorSymbol,
  specialSymbol,
  operatorPrecedence,
  isUnarySpecial,
  consumeSpecialCard,
  resetSpecialCard,
} from "./cards.js";
export { Hand } from "./hand.js";
export { Expression, type Term } from "./expression.js";
export { validateExpression, GENERAL_FAILURE_MESSAGE } from "./expression-validator.js";
export { evaluateExpression, evaluateLeftToRight, DIVISION_EPSILON } from "./expression-evaluator.js";
export {
  findBestExpression,
  buildFallbackExpression,
  selectAiExpression,
  type AiTurn,
} from "./search-engine.js";
export { ExpressionBuilder, HINTS, type SelectionResult } from "./expression-builder.js";
export {
  scoreRound,
  summarizeRound,
  DRAW_TOLERANCE,
  type RoundInput,
  type Submission,
} from "./round-scoring.js";
