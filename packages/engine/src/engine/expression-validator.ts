// ─── Expression Validator ──────────────────────────────────────────
// Checks a submitted expression against the hand it was built from.
// Stages run in order and the first failure wins:
//   not empty → complete → numbers → roots → multiplies → disabled ops.

import type {
  ValidationResult,
  ValidationStage,
} from "@math-high-low/schema";
import { operatorSymbol } from "./cards.js";
import type { Expression } from "./expression.js";
import type { Hand } from "./hand.js";

/** User-facing message shared by every rejection. */
export const GENERAL_FAILURE_MESSAGE = "The expression could not be completed.";

function reject(stage: ValidationStage, reason: string): ValidationResult {
  return {
    isValid: false,
    stage,
    errorMessage: GENERAL_FAILURE_MESSAGE,
    reason,
  };
}

function times(count: number): string {
  return count === 1 ? "1 time" : `${count} times`;
}

/** Reports a usage mismatch, or undefined when the counts agree. */
function usageMismatch(
  label: string,
  used: number,
  required: number
): string | undefined {
  if (used < required) {
    const missing = required - used;
    return `${label} must be used ${missing} more ${missing === 1 ? "time" : "times"}`;
  }
  if (used > required) {
    return `${label} is used ${times(used - required)} too many`;
  }
  return undefined;
}

function countValues(values: Iterable<number>): Map<number, number> {
  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

function checkNumberUsage(expression: Expression, hand: Hand): string | undefined {
  const available = countValues(hand.numberCards.map((c) => c.value));
  const used = countValues(expression.terms.map((t) => Math.round(t.value)));

  // Hand values first, then values the hand never held.
  for (const [value, required] of available) {
    const mismatch = usageMismatch(`Number ${value}`, used.get(value) ?? 0, required);
    if (mismatch) return mismatch;
  }
  for (const [value, count] of used) {
    if (!available.has(value)) {
      return usageMismatch(`Number ${value}`, count, 0);
    }
  }
  return undefined;
}

/**
 * Validates an expression against a hand's mandatory card usage.
 * Never throws; the first failing stage is reported in the result.
 */
export function validateExpression(
  expression: Expression,
  hand: Hand
): ValidationResult {
  if (expression.isEmpty()) {
    return reject("not_empty", "Expression is empty");
  }

  if (!expression.isComplete()) {
    return reject("complete", "Expression is incomplete");
  }

  const numberMismatch = checkNumberUsage(expression, hand);
  if (numberMismatch) {
    return reject("number_usage", numberMismatch);
  }

  const rootMismatch = usageMismatch(
    "√",
    expression.rootCount,
    hand.requiredRootCount
  );
  if (rootMismatch) {
    return reject("root_usage", rootMismatch);
  }

  const multiplyMismatch = usageMismatch(
    "×",
    expression.multiplyCount,
    hand.requiredMultiplyCount
  );
  if (multiplyMismatch) {
    return reject("multiply_usage", multiplyMismatch);
  }

  // Multiply is governed by special cards, never by the disabled set.
  for (const operator of expression.operators) {
    if (operator !== "multiply" && !hand.isOperatorEnabled(operator)) {
      return reject(
        "disabled_operator",
        `Disabled operator used: ${operatorSymbol(operator)}`
      );
    }
  }

  return { isValid: true };
}
