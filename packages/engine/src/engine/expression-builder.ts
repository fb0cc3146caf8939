// ─── Expression Builder ────────────────────────────────────────────
// The human input path: builds an expression one selected card at a
// time with the same legality rules the table enforces. Every
// selection returns a result with a status hint or a rejection reason.

import type {
  Card,
  NumberCard,
  OperatorCard,
  SpecialCard,
} from "@math-high-low/schema";
import { consumeSpecialCard, resetSpecialCard } from "./cards.js";
import { Expression, type Term } from "./expression.js";
import type { Hand } from "./hand.js";

export type SelectionResult =
  | { readonly accepted: true; readonly hint: string }
  | { readonly accepted: false; readonly reason: string };

/** One accepted selection and the cards it used. */
type Step =
  | { readonly kind: "term"; readonly term: Term; readonly cards: readonly Card[] }
  | { readonly kind: "operator"; readonly card: OperatorCard | SpecialCard };

export const HINTS = {
  selectNumber: "Select a number card.",
  selectOperator: "Select an operator card.",
  rootApplied: "√ applied. Select an operator card.",
  rootArmed: "The next number selected gets the √.",
  useSpecials: "Use every √ and × card before submitting.",
  complete: "Expression complete. Submit when ready.",
} as const;

function accept(hint: string): SelectionResult {
  return { accepted: true, hint };
}

function refuse(reason: string): SelectionResult {
  return { accepted: false, reason };
}

export class ExpressionBuilder {
  private readonly steps: Step[] = [];
  private readonly used = new Set<Card>();
  private pendingRoot: SpecialCard | undefined;
  private current = new Expression();

  constructor(private readonly hand: Hand) {
    this.reset();
  }

  /** An independent copy of the expression built so far. */
  get expression(): Expression {
    return this.current.clone();
  }

  get isRootPending(): boolean {
    return this.pendingRoot !== undefined;
  }

  isUsed(card: Card): boolean {
    return this.used.has(card);
  }

  select(card: Card): SelectionResult {
    if (!this.hand.holds(card)) {
      return refuse("That card is not in this hand.");
    }
    if (this.used.has(card)) {
      return refuse("That card has already been used.");
    }

    switch (card.kind) {
      case "number":
        return this.selectNumber(card);
      case "operator":
        return this.selectOperator(card);
      case "special":
        return card.special === "forced_multiply"
          ? this.selectMultiply(card)
          : this.selectRoot(card);
    }
  }

  /** Reverts the last selection, or disarms a pending √ first. */
  undo(): boolean {
    if (this.pendingRoot) {
      this.pendingRoot = undefined;
      return true;
    }
    const step = this.steps.pop();
    if (!step) return false;

    const cards = step.kind === "term" ? step.cards : [step.card];
    for (const card of cards) {
      this.used.delete(card);
      if (card.kind === "special") resetSpecialCard(card);
    }
    this.rebuild();
    return true;
  }

  /** Clears the expression and marks every card in the hand unused. */
  reset(): void {
    this.steps.length = 0;
    this.used.clear();
    this.pendingRoot = undefined;
    this.current = new Expression();
    for (const card of this.hand.specialCards) {
      resetSpecialCard(card);
    }
  }

  hasUnusedNumberCards(): boolean {
    return this.hand.numberCards.some((card) => !this.used.has(card));
  }

  /** True once the expression is non-empty and every special card is consumed. */
  hasUsedRequiredSpecialCards(): boolean {
    if (this.current.isEmpty()) return false;
    return this.hand.specialCards.every((card) => card.consumed);
  }

  /** True when all numbers are placed but a √ or × card is still unused. */
  needsSpecialCardReminder(): boolean {
    if (this.current.isEmpty()) return false;
    return this.isArranged() && !this.hasUsedRequiredSpecialCards();
  }

  // ─── Selections ─────────────────────────────────────────────────

  private selectNumber(card: NumberCard): SelectionResult {
    if (!this.current.expectingNumber()) {
      return refuse("Select an operator card now.");
    }

    const root = this.pendingRoot;
    const cards: Card[] = [card];
    if (root) {
      consumeSpecialCard(root);
      cards.push(root);
      this.pendingRoot = undefined;
    }
    this.push({ kind: "term", term: { value: card.value, hasRoot: root !== undefined }, cards });

    if (this.isArranged()) return accept(this.completionHint());
    if (root) return accept(HINTS.rootApplied);
    return accept(this.current.expectingNumber() ? HINTS.selectNumber : HINTS.selectOperator);
  }

  private selectOperator(card: OperatorCard): SelectionResult {
    if (this.current.isEmpty() || this.current.expectingNumber()) {
      return refuse("Select a number card now.");
    }
    if (!this.hasUnusedNumberCards()) {
      return refuse("No numbers are left; the expression is ready to submit.");
    }
    this.push({ kind: "operator", card });
    return accept(HINTS.selectNumber);
  }

  private selectMultiply(card: SpecialCard): SelectionResult {
    if (this.current.isEmpty() || this.current.expectingNumber()) {
      return refuse("Place a number before using the × card.");
    }
    if (!this.hasUnusedNumberCards()) {
      return refuse("No numbers are left for the × card.");
    }
    consumeSpecialCard(card);
    this.push({ kind: "operator", card });
    return accept(HINTS.selectNumber);
  }

  private selectRoot(card: SpecialCard): SelectionResult {
    if (this.pendingRoot) {
      return refuse("A √ card is already waiting for a number.");
    }
    if (!this.current.expectingNumber()) {
      return refuse("Use the √ card when a number is expected.");
    }
    if (!this.hasUnusedNumberCards()) {
      return refuse("No numbers are left for the √ card.");
    }
    this.pendingRoot = card;
    return accept(HINTS.rootArmed);
  }

  // ─── Internals ──────────────────────────────────────────────────

  private push(step: Step): void {
    this.steps.push(step);
    const cards = step.kind === "term" ? step.cards : [step.card];
    for (const card of cards) {
      this.used.add(card);
    }
    this.rebuild();
  }

  private rebuild(): void {
    const expression = new Expression();
    for (const step of this.steps) {
      if (step.kind === "term") {
        expression.addNumber(step.term.value, step.term.hasRoot);
      } else if (step.card.kind === "operator") {
        expression.addOperator(step.card.operator);
      } else {
        expression.addOperator("multiply");
      }
    }
    this.current = expression;
  }

  /** Every number placed and the expression ends on a number. */
  private isArranged(): boolean {
    return !this.hasUnusedNumberCards() && !this.current.expectingNumber();
  }

  private completionHint(): string {
    return this.hasUsedRequiredSpecialCards() ? HINTS.complete : HINTS.useSpecials;
  }
}
