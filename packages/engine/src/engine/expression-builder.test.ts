import { describe, it, expect, beforeEach } from "vitest";
import type { NumberCard, OperatorCard, SpecialCard } from "@math-high-low/schema";
import { numberCard, operatorCard, specialCard } from "./cards.js";
import { ExpressionBuilder, HINTS, type SelectionResult } from "./expression-builder.js";
import { Hand } from "./hand.js";

function hintOf(result: SelectionResult): string {
  if (!result.accepted) {
    throw new Error(`expected acceptance, got "${result.reason}"`);
  }
  return result.hint;
}

function reasonOf(result: SelectionResult): string {
  if (result.accepted) {
    throw new Error(`expected rejection, got "${result.hint}"`);
  }
  return result.reason;
}

describe("ExpressionBuilder", () => {
  let n4: NumberCard;
  let n9: NumberCard;
  let n2: NumberCard;
  let add: OperatorCard;
  let subtract: OperatorCard;
  let root: SpecialCard;
  let multiply: SpecialCard;
  let hand: Hand;
  let builder: ExpressionBuilder;

  beforeEach(() => {
    n4 = numberCard(4);
    n9 = numberCard(9);
    n2 = numberCard(2);
    add = operatorCard("add");
    subtract = operatorCard("subtract");
    root = specialCard("unary_root");
    multiply = specialCard("forced_multiply");
    hand = Hand.of([n4, n9, n2, add, subtract, root, multiply]);
    builder = new ExpressionBuilder(hand);
  });

  // ── Building ─────────────────────────────────────────────────────

  describe("building", () => {
    it("walks through a full expression with status hints", () => {
      expect(hintOf(builder.select(n4))).toBe(HINTS.selectOperator);
      expect(hintOf(builder.select(multiply))).toBe(HINTS.selectNumber);
      expect(hintOf(builder.select(root))).toBe(HINTS.rootArmed);
      expect(hintOf(builder.select(n9))).toBe(HINTS.rootApplied);
      expect(hintOf(builder.select(add))).toBe(HINTS.selectNumber);
      expect(hintOf(builder.select(n2))).toBe(HINTS.complete);

      expect(builder.expression.toDisplayString()).toBe("4 × √9 + 2");
      expect(builder.hasUsedRequiredSpecialCards()).toBe(true);
      expect(builder.needsSpecialCardReminder()).toBe(false);
    });

    it("consumes special cards as they are applied", () => {
      builder.select(n4);
      builder.select(multiply);
      expect(multiply.consumed).toBe(true);

      builder.select(root);
      expect(root.consumed).toBe(false);
      expect(builder.isRootPending).toBe(true);

      builder.select(n9);
      expect(root.consumed).toBe(true);
      expect(builder.isRootPending).toBe(false);
    });

    it("reminds about unused special cards once every number is placed", () => {
      builder.select(n4);
      builder.select(add);
      builder.select(n9);
      builder.select(subtract);

      expect(hintOf(builder.select(n2))).toBe(HINTS.useSpecials);
      expect(builder.hasUnusedNumberCards()).toBe(false);
      expect(builder.needsSpecialCardReminder()).toBe(true);
    });

    it("marks selected cards as used", () => {
      builder.select(n4);
      expect(builder.isUsed(n4)).toBe(true);
      expect(builder.isUsed(n9)).toBe(false);
    });

    it("hands out an independent copy of the expression", () => {
      builder.select(n4);
      builder.expression.clear();
      expect(builder.expression.terms).toEqual([{ value: 4, hasRoot: false }]);
    });
  });

  // ── Rejections ───────────────────────────────────────────────────

  describe("rejections", () => {
    it("rejects a card from another hand", () => {
      expect(reasonOf(builder.select(numberCard(4)))).toBe("That card is not in this hand.");
    });

    it("rejects a card already used", () => {
      builder.select(n4);
      expect(reasonOf(builder.select(n4))).toBe("That card has already been used.");
    });

    it("rejects a number where an operator belongs", () => {
      builder.select(n4);
      expect(reasonOf(builder.select(n9))).toBe("Select an operator card now.");
    });

    it("rejects an operator where a number belongs", () => {
      expect(reasonOf(builder.select(add))).toBe("Select a number card now.");
    });

    it("rejects an operator after the last number", () => {
      builder.select(n4);
      builder.select(multiply);
      builder.select(root);
      builder.select(n9);
      builder.select(add);
      builder.select(n2);

      expect(reasonOf(builder.select(subtract))).toBe(
        "No numbers are left; the expression is ready to submit."
      );
    });

    it("rejects the × card before any number", () => {
      expect(reasonOf(builder.select(multiply))).toBe("Place a number before using the × card.");
    });

    it("rejects the × card after the last number", () => {
      builder.select(n4);
      builder.select(add);
      builder.select(n9);
      builder.select(subtract);
      builder.select(n2);

      expect(reasonOf(builder.select(multiply))).toBe("No numbers are left for the × card.");
    });

    it("rejects a second √ while one is waiting", () => {
      builder.select(root);
      expect(reasonOf(builder.select(root))).toBe("A √ card is already waiting for a number.");
    });

    it("rejects a √ where an operator belongs", () => {
      builder.select(n4);
      expect(reasonOf(builder.select(root))).toBe("Use the √ card when a number is expected.");
    });

    it("rejects a √ when the hand has no numbers", () => {
      const lone = specialCard("unary_root");
      const empty = new ExpressionBuilder(Hand.of([lone]));
      expect(reasonOf(empty.select(lone))).toBe("No numbers are left for the √ card.");
    });

    it("leaves the expression unchanged after a rejection", () => {
      builder.select(n4);
      builder.select(n9);
      expect(builder.expression.terms).toEqual([{ value: 4, hasRoot: false }]);
      expect(builder.isUsed(n9)).toBe(false);
    });
  });

  // ── Undo and reset ───────────────────────────────────────────────

  describe("undo", () => {
    it("disarms a pending √ before touching the expression", () => {
      builder.select(n4);
      builder.select(multiply);
      builder.select(root);

      expect(builder.undo()).toBe(true);
      expect(builder.isRootPending).toBe(false);
      expect(builder.expression.operators).toEqual(["multiply"]);
    });

    it("returns the × card to the hand", () => {
      builder.select(n4);
      builder.select(multiply);

      expect(builder.undo()).toBe(true);
      expect(builder.isUsed(multiply)).toBe(false);
      expect(multiply.consumed).toBe(false);
      expect(builder.expression.operators).toEqual([]);
      expect(builder.expression.terms).toHaveLength(1);
    });

    it("returns a rooted number together with its √ card", () => {
      builder.select(root);
      builder.select(n9);

      builder.undo();

      expect(builder.isUsed(n9)).toBe(false);
      expect(builder.isUsed(root)).toBe(false);
      expect(root.consumed).toBe(false);
      expect(builder.expression.isEmpty()).toBe(true);
    });

    it("reports false when there is nothing to undo", () => {
      expect(builder.undo()).toBe(false);
    });
  });

  describe("reset", () => {
    it("clears the expression and frees every card", () => {
      builder.select(n4);
      builder.select(multiply);
      builder.select(root);
      builder.select(n9);

      builder.reset();

      expect(builder.expression.isEmpty()).toBe(true);
      expect(builder.isRootPending).toBe(false);
      expect(builder.isUsed(n4)).toBe(false);
      expect(multiply.consumed).toBe(false);
      expect(root.consumed).toBe(false);
      expect(builder.hasUsedRequiredSpecialCards()).toBe(false);
    });

    it("runs when a builder is created", () => {
      multiply.consumed = true;
      new ExpressionBuilder(hand);
      expect(multiply.consumed).toBe(false);
    });
  });
});
