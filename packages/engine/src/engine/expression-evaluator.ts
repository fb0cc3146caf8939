// ─── Expression Evaluator ──────────────────────────────────────────
// Computes the value of an expression in two passes:
//   1. apply square roots to flagged terms
//   2. reduce with an operand stack and an operator stack, honoring
//      precedence (× ÷ before + -) and left-to-right among equals.
// Failures come back as results; nothing is thrown to the caller.

import type {
  EvaluationErrorKind,
  EvaluationResult,
  OperatorKind,
} from "@math-high-low/schema";
import { operatorPrecedence } from "./cards.js";
import type { Expression } from "./expression.js";

/** Divisors closer to zero than this are treated as zero. */
export const DIVISION_EPSILON = 1e-9;

const ERROR_MESSAGES: Readonly<Record<EvaluationErrorKind, string>> = {
  empty_expression: "empty expression",
  incomplete_expression: "incomplete expression",
  negative_root: "negative argument to unary root",
  division_by_zero: "division by zero",
  internal: "internal evaluation fault",
};

function fail(errorKind: EvaluationErrorKind): EvaluationResult {
  return { success: false, errorKind, errorMessage: ERROR_MESSAGES[errorKind] };
}

/** Raised inside the reducer; converted to a result at the public boundary. */
class EvaluationFault extends Error {
  constructor(readonly kind: EvaluationErrorKind) {
    super(ERROR_MESSAGES[kind]);
    this.name = "EvaluationFault";
  }
}

// ─── Pass 1: Square Roots ──────────────────────────────────────────

function applyRoots(expression: Expression): number[] {
  return expression.terms.map((term) => {
    if (!term.hasRoot) return term.value;
    if (term.value < 0) {
      throw new EvaluationFault("negative_root");
    }
    return Math.sqrt(term.value);
  });
}

// ─── Pass 2: Precedence Reduction ──────────────────────────────────

function applyOperator(left: number, operator: OperatorKind, right: number): number {
  switch (operator) {
    case "add":
      return left + right;
    case "subtract":
      return left - right;
    case "multiply":
      return left * right;
    case "divide":
      if (Math.abs(right) < DIVISION_EPSILON) {
        throw new EvaluationFault("division_by_zero");
      }
      return left / right;
  }
}

/** Pops one operator and two operands, pushes the result. */
function reduceTop(operands: number[], operators: OperatorKind[]): void {
  const operator = operators.pop();
  const right = operands.pop();
  const left = operands.pop();
  if (operator === undefined || right === undefined || left === undefined) {
    throw new EvaluationFault("internal");
  }
  operands.push(applyOperator(left, operator, right));
}

function reduceWithPrecedence(
  values: readonly number[],
  operators: readonly OperatorKind[]
): number {
  const [first, ...rest] = values;
  if (first === undefined) {
    throw new EvaluationFault("internal");
  }

  const operandStack: number[] = [first];
  const operatorStack: OperatorKind[] = [];

  rest.forEach((operand, i) => {
    const incoming = operators[i];
    if (incoming === undefined) {
      throw new EvaluationFault("internal");
    }
    // `>=` keeps equal-precedence operators left-associative.
    for (
      let top = operatorStack.at(-1);
      top !== undefined &&
      operatorPrecedence(top) >= operatorPrecedence(incoming);
      top = operatorStack.at(-1)
    ) {
      reduceTop(operandStack, operatorStack);
    }
    operatorStack.push(incoming);
    operandStack.push(operand);
  });

  while (operatorStack.length > 0) {
    reduceTop(operandStack, operatorStack);
  }

  const result = operandStack.pop();
  if (result === undefined || operandStack.length > 0) {
    throw new EvaluationFault("internal");
  }
  return result;
}

function reduceLeftToRight(
  values: readonly number[],
  operators: readonly OperatorKind[]
): number {
  const [first, ...rest] = values;
  if (first === undefined) {
    throw new EvaluationFault("internal");
  }
  return rest.reduce((acc, operand, i) => {
    const operator = operators[i];
    if (operator === undefined) {
      throw new EvaluationFault("internal");
    }
    return applyOperator(acc, operator, operand);
  }, first);
}

// ─── Public API ────────────────────────────────────────────────────

type Reducer = (
  values: readonly number[],
  operators: readonly OperatorKind[]
) => number;

function run(expression: Expression, reducer: Reducer): EvaluationResult {
  if (expression.isEmpty()) {
    return fail("empty_expression");
  }
  if (!expression.isComplete()) {
    return fail("incomplete_expression");
  }

  try {
    const values = applyRoots(expression);
    return { success: true, value: reducer(values, expression.operators) };
  } catch (error) {
    if (!(error instanceof EvaluationFault)) {
      throw error;
    }
    if (error.kind === "internal") {
      console.error(
        `[ExpressionEvaluator] internal fault (operand stack underflow) while evaluating "${expression.toDisplayString()}"`
      );
    }
    return fail(error.kind);
  }
}

/**
 * Evaluates an expression with standard precedence.
 * Safe to call on unvalidated expressions: empties and incomplete
 * sequences are rejected before any arithmetic.
 */
export function evaluateExpression(expression: Expression): EvaluationResult {
  return run(expression, reduceWithPrecedence);
}

/**
 * Evaluates strictly left to right, ignoring precedence.
 * Roots are still applied first and the same errors apply.
 */
export function evaluateLeftToRight(expression: Expression): EvaluationResult {
  return run(expression, reduceLeftToRight);
}
