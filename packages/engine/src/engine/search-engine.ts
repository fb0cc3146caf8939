// ─── Search Engine ─────────────────────────────────────────────────
// Finds the legal expression whose value lands closest to a target.
// Exhaustive backtracking over three nested decision spaces:
//   1. distinct orderings of the hand's number values
//   2. placements of the required square roots (at most one per term)
//   3. operator assignments: forced multiplies plus each enabled
//      operator card used at most once
// All search state lives in a per-call context; nothing is shared
// between invocations.

import type { OperatorKind } from "@math-high-low/schema";
import { Expression } from "./expression.js";
import { evaluateExpression } from "./expression-evaluator.js";
import { validateExpression } from "./expression-validator.js";
import type { Hand } from "./hand.js";

interface Candidate {
  readonly expression: Expression;
  readonly distance: number;
}

/** Per-call state threaded through every recursive stage. */
interface SearchContext {
  readonly hand: Hand;
  readonly target: number;
  readonly requiredRoots: number;
  readonly requiredMultiplies: number;
  readonly slots: number;
  /** Whether rule-compliant candidates take priority over closer ones. */
  readonly prioritize: boolean;
  best: Candidate | undefined;
  prioritized: Candidate | undefined;
}

// ─── Stage 1: Permutations ─────────────────────────────────────────

/**
 * Visits each distinct ordering once. Values are tried in the order
 * they first appear in the hand; `remaining` tracks unused copies.
 */
function permuteNumbers(
  ctx: SearchContext,
  remaining: Map<number, number>,
  current: number[],
  total: number
): void {
  if (current.length === total) {
    placeRoots(ctx, current, 0, []);
    return;
  }

  for (const [value, count] of remaining) {
    if (count === 0) continue;
    remaining.set(value, count - 1);
    current.push(value);

    permuteNumbers(ctx, remaining, current, total);

    current.pop();
    remaining.set(value, count);
  }
}

// ─── Stage 2: Root Placement ───────────────────────────────────────

function placeRoots(
  ctx: SearchContext,
  numbers: readonly number[],
  index: number,
  flags: boolean[]
): void {
  const placed = flags.filter(Boolean).length;

  if (index === numbers.length) {
    if (placed === ctx.requiredRoots) {
      assignOperators(ctx, numbers, flags, [], [...ctx.hand.usableOperatorInstances()], 0, 0);
    }
    return;
  }

  const remaining = ctx.requiredRoots - placed;
  const positionsLeft = numbers.length - index;
  const most = Math.min(1, remaining);
  const least = Math.max(0, remaining - (positionsLeft - 1));
  if (least > most) return;

  // Rooted branch first, then bare.
  for (let count = most; count >= least; count--) {
    flags.push(count > 0);
    placeRoots(ctx, numbers, index + 1, flags);
    flags.pop();
  }
}

// ─── Stage 3: Operator Assignment ──────────────────────────────────

function assignOperators(
  ctx: SearchContext,
  numbers: readonly number[],
  flags: readonly boolean[],
  operators: OperatorKind[],
  pool: OperatorKind[],
  index: number,
  multiplyUsed: number
): void {
  const slotsRemaining = ctx.slots - index;
  const multiplyRemaining = ctx.requiredMultiplies - multiplyUsed;
  if (multiplyRemaining > slotsRemaining) return;

  if (index === ctx.slots) {
    if (multiplyUsed === ctx.requiredMultiplies) {
      considerCandidate(ctx, numbers, flags, operators);
    }
    return;
  }

  // Forced multiplies come from special cards, not from the pool.
  if (multiplyUsed < ctx.requiredMultiplies) {
    operators.push("multiply");
    assignOperators(ctx, numbers, flags, operators, pool, index + 1, multiplyUsed + 1);
    operators.pop();
  }

  for (let i = 0; i < pool.length; i++) {
    const [operator] = pool.splice(i, 1);
    if (operator === undefined) continue;
    operators.push(operator);

    assignOperators(ctx, numbers, flags, operators, pool, index + 1, multiplyUsed);

    operators.pop();
    pool.splice(i, 0, operator);
  }
}

// ─── Scoring ───────────────────────────────────────────────────────

function usesAllRequiredSpecials(ctx: SearchContext, expression: Expression): boolean {
  return (
    expression.rootCount === ctx.requiredRoots &&
    expression.multiplyCount === ctx.requiredMultiplies
  );
}

function considerCandidate(
  ctx: SearchContext,
  numbers: readonly number[],
  flags: readonly boolean[],
  operators: readonly OperatorKind[]
): void {
  const expression = Expression.from(
    numbers.map((value, i) => ({ value, hasRoot: flags[i] ?? false })),
    operators
  );

  if (!validateExpression(expression, ctx.hand).isValid) return;

  const evaluation = evaluateExpression(expression);
  if (!evaluation.success) return;

  const distance = Math.abs(evaluation.value - ctx.target);

  // Strict `<`: the first candidate found wins ties.
  if (
    ctx.prioritize &&
    usesAllRequiredSpecials(ctx, expression) &&
    distance < (ctx.prioritized?.distance ?? Infinity)
  ) {
    ctx.prioritized = { expression: expression.clone(), distance };
  }

  if (distance < (ctx.best?.distance ?? Infinity)) {
    ctx.best = { expression: expression.clone(), distance };
  }
}

// ─── Public API ────────────────────────────────────────────────────

/**
 * Returns the legal expression closest to `target`, or an empty
 * expression when the hand admits no legal arrangement.
 *
 * Deterministic: the same hand and target always yield the same
 * expression. The result is an independent copy.
 */
export function findBestExpression(hand: Hand, target: number): Expression {
  const numbers = hand.numberCards.map((card) => card.value);
  if (numbers.length === 0) {
    return new Expression();
  }

  const requiredRoots = hand.requiredRootCount;
  const requiredMultiplies = hand.requiredMultiplyCount;
  const slots = Math.max(0, numbers.length - 1);

  if (requiredMultiplies > slots) {
    return new Expression();
  }
  if (slots - requiredMultiplies > hand.usableOperatorInstances().length) {
    return new Expression();
  }

  const ctx: SearchContext = {
    hand,
    target,
    requiredRoots,
    requiredMultiplies,
    slots,
    prioritize: requiredRoots > 0 || requiredMultiplies > 0,
    best: undefined,
    prioritized: undefined,
  };

  const remaining = new Map<number, number>();
  for (const value of numbers) {
    remaining.set(value, (remaining.get(value) ?? 0) + 1);
  }
  permuteNumbers(ctx, remaining, [], numbers.length);

  const chosen = (ctx.prioritize ? ctx.prioritized : undefined) ?? ctx.best;
  return chosen ? chosen.expression.clone() : new Expression();
}

/**
 * Deterministic constructive expression used when the search result
 * does not validate: numbers in held order, roots on the first terms,
 * then forced multiplies, then the held operator cards, then Add.
 * Not guaranteed to validate for degenerate hands.
 */
export function buildFallbackExpression(hand: Hand): Expression {
  const fallback = new Expression();
  const numbers = hand.numberCards.map((card) => card.value);
  if (numbers.length === 0) {
    return fallback;
  }

  let rootsRemaining = hand.requiredRootCount;
  let multipliesRemaining = Math.min(
    hand.requiredMultiplyCount,
    Math.max(0, numbers.length - 1)
  );
  const operatorQueue = hand.operatorCards.map((card) => card.operator);

  numbers.forEach((value, i) => {
    const hasRoot = rootsRemaining > 0;
    if (hasRoot) rootsRemaining--;
    fallback.addNumber(value, hasRoot);

    if (i === numbers.length - 1) return;

    if (multipliesRemaining > 0) {
      multipliesRemaining--;
      fallback.addOperator("multiply");
    } else {
      fallback.addOperator(operatorQueue.shift() ?? "add");
    }
  });

  return fallback;
}

// ─── AI Turn ───────────────────────────────────────────────────────

export interface AiTurn {
  readonly expression: Expression;
  /** Which path produced the expression. */
  readonly source: "search" | "fallback";
  /** Whether the returned expression passes validation. */
  readonly valid: boolean;
}

/**
 * Plays the AI side of a round: searches, and falls back to the
 * constructive expression if the search result fails validation.
 */
export function selectAiExpression(hand: Hand, target: number): AiTurn {
  const searched = findBestExpression(hand, target);
  const validation = validateExpression(searched, hand);

  if (validation.isValid) {
    console.debug(`[AI] chose expression: ${searched.toDisplayString()}`);
    return { expression: searched, source: "search", valid: true };
  }

  console.warn(`[AI] searched expression is invalid: ${validation.reason}`);
  const fallback = buildFallbackExpression(hand);
  const fallbackValidation = validateExpression(fallback, hand);

  if (!fallbackValidation.isValid) {
    console.error(
      `[AI] fallback expression also violates the rules: ${fallbackValidation.reason}`
    );
  }

  return {
    expression: fallback,
    source: "fallback",
    valid: fallbackValidation.isValid,
  };
}
