import { describe, it, expect } from "vitest";
import type { OperatorKind } from "@math-high-low/schema";
import { numberCard, operatorCard } from "./cards.js";
import { Expression } from "./expression.js";
import { GENERAL_FAILURE_MESSAGE } from "./expression-validator.js";
import { Hand } from "./hand.js";
import { scoreRound, summarizeRound, type Submission } from "./round-scoring.js";

// ─── Test Helpers ──────────────────────────────────────────────────

/** A hand holding exactly the cards of the expression it submits. */
function submit(numbers: readonly number[], operators: readonly OperatorKind[]): Submission {
  const hand = Hand.of([...numbers.map(numberCard), ...operators.map(operatorCard)]);
  const expression = Expression.from(
    numbers.map((value) => ({ value, hasRoot: false })),
    operators
  );
  return { expression, hand };
}

function emptySubmission(): Submission {
  return { expression: new Expression(), hand: Hand.of([numberCard(1)]) };
}

// ─── Tests ─────────────────────────────────────────────────────────

describe("scoreRound", () => {
  it("awards the bet to the player when the player is closer", () => {
    const result = scoreRound({
      target: 20,
      bet: 3,
      player: submit([10, 10, 0], ["add", "subtract"]),
      ai: submit([5, 5, 5], ["add", "subtract"]),
    });

    expect(result.winner).toBe("player");
    expect(result.playerScoreChange).toBe(3);
    expect(result.aiScoreChange).toBe(-3);
    expect(result.player).toEqual({
      expression: "10 + 10 - 0",
      value: 20,
      difference: 0,
      error: "",
    });
    expect(result.ai.value).toBe(5);
    expect(result.ai.difference).toBe(15);
    expect(summarizeRound(result)).toBe("Player wins! (+3)");
  });

  it("awards the bet to the AI when the AI is closer", () => {
    const result = scoreRound({
      target: 20,
      bet: 3,
      player: submit([5, 5, 5], ["add", "subtract"]),
      ai: submit([10, 10, 0], ["add", "subtract"]),
    });

    expect(result.winner).toBe("ai");
    expect(result.playerScoreChange).toBe(-3);
    expect(result.aiScoreChange).toBe(3);
    expect(summarizeRound(result)).toBe("AI wins! (-3)");
  });

  it("calls equal distances on either side of the target a draw", () => {
    const result = scoreRound({
      target: 20,
      bet: 2,
      player: submit([10, 9], ["add"]),
      ai: submit([10, 10, 1], ["add", "add"]),
    });

    expect(result.player.difference).toBe(1);
    expect(result.ai.difference).toBe(1);
    expect(result.winner).toBe("draw");
    expect(result.playerScoreChange).toBe(0);
    expect(result.aiScoreChange).toBe(0);
    expect(summarizeRound(result)).toBe("Draw");
  });

  it("voids the round when both sides fail", () => {
    const result = scoreRound({
      target: 1,
      bet: 5,
      player: emptySubmission(),
      ai: emptySubmission(),
    });

    expect(result.winner).toBe("invalid");
    expect(result.playerScoreChange).toBe(0);
    expect(result.aiScoreChange).toBe(0);
    expect(result.player.expression).toBe("-");
    expect(result.player.value).toBeNaN();
    expect(result.player.difference).toBe(Infinity);
    expect(result.player.error).toBe(GENERAL_FAILURE_MESSAGE);
    expect(summarizeRound(result)).toBe("Round void");
  });

  it("lets a valid side beat one that breaks the rules", () => {
    const result = scoreRound({
      target: 20,
      bet: 1,
      player: emptySubmission(),
      ai: submit([5, 5, 5], ["add", "subtract"]),
    });

    expect(result.winner).toBe("ai");
    expect(result.playerScoreChange).toBe(-1);
  });

  it("validates the AI side as well", () => {
    const player = submit([1, 2], ["add"]);
    const ai = submit([1, 2], ["add"]);
    ai.hand.disableOperator("add");

    const result = scoreRound({ target: 20, bet: 1, player, ai });

    expect(result.ai.error).toBe(GENERAL_FAILURE_MESSAGE);
    expect(result.winner).toBe("player");
  });

  it("scores an evaluation failure at infinite distance", () => {
    const result = scoreRound({
      target: 1,
      bet: 2,
      player: submit([3, 1, 0], ["subtract", "divide"]),
      ai: submit([1], []),
    });

    expect(result.player.error).toBe("division by zero");
    expect(result.player.difference).toBe(Infinity);
    expect(result.ai.difference).toBe(0);
    expect(result.winner).toBe("ai");
  });

  it("leaves the submitted expressions untouched", () => {
    const player = submit([10, 10, 0], ["add", "subtract"]);
    scoreRound({ target: 20, bet: 1, player, ai: emptySubmission() });
    expect(player.expression.toDisplayString()).toBe("10 + 10 - 0");
  });
});
