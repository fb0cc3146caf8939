// ─── Round Scoring ─────────────────────────────────────────────────
// Validates and evaluates both sides' submissions and decides the
// round. A side whose expression fails either check sits at an
// infinite distance from the target instead of aborting the round.

import type {
  RoundResult,
  RoundWinner,
  SideResult,
} from "@math-high-low/schema";
import { evaluateExpression } from "./expression-evaluator.js";
import { validateExpression } from "./expression-validator.js";
import type { Expression } from "./expression.js";
import type { Hand } from "./hand.js";

/** Distances closer than this count as a draw. */
export const DRAW_TOLERANCE = 1e-6;

export interface Submission {
  readonly expression: Expression;
  readonly hand: Hand;
}

export interface RoundInput {
  readonly target: number;
  readonly bet: number;
  readonly player: Submission;
  readonly ai: Submission;
}

function scoreSide(submission: Submission, target: number): SideResult {
  const { expression, hand } = submission;

  const validation = validateExpression(expression, hand);
  if (!validation.isValid) {
    return {
      expression: "-",
      value: NaN,
      difference: Infinity,
      error: validation.errorMessage,
    };
  }

  const evaluation = evaluateExpression(expression);
  if (!evaluation.success) {
    return {
      expression: "-",
      value: NaN,
      difference: Infinity,
      error: evaluation.errorMessage,
    };
  }

  return {
    expression: expression.toDisplayString(),
    value: evaluation.value,
    difference: Math.abs(evaluation.value - target),
    error: "",
  };
}

function decideWinner(player: SideResult, ai: SideResult): RoundWinner {
  if (player.difference === Infinity && ai.difference === Infinity) {
    return "invalid";
  }
  if (Math.abs(player.difference - ai.difference) < DRAW_TOLERANCE) {
    return "draw";
  }
  return player.difference < ai.difference ? "player" : "ai";
}

function playerScoreChange(winner: RoundWinner, bet: number): number {
  switch (winner) {
    case "player":
      return bet;
    case "ai":
      return -bet;
    case "draw":
    case "invalid":
      return 0;
  }
}

/** Scores a finished round. Pure: neither hand nor expression is mutated. */
export function scoreRound(input: RoundInput): RoundResult {
  const player = scoreSide(input.player, input.target);
  const ai = scoreSide(input.ai, input.target);
  const winner = decideWinner(player, ai);
  const change = playerScoreChange(winner, input.bet);

  return {
    target: input.target,
    bet: input.bet,
    player,
    ai,
    winner,
    playerScoreChange: change,
    aiScoreChange: change === 0 ? 0 : -change,
  };
}

/** One-line summary of the round outcome. */
export function summarizeRound(result: RoundResult): string {
  switch (result.winner) {
    case "player":
      return `Player wins! (+${result.playerScoreChange})`;
    case "ai":
      return `AI wins! (${result.playerScoreChange})`;
    case "draw":
      return "Draw";
    case "invalid":
      return "Round void";
  }
}
