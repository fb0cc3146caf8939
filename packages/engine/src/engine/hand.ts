// ─── Hand ──────────────────────────────────────────────────────────
// The cards one side holds for a round. The number-card multiset and
// the special-card counts define what a valid expression must use.

import type {
  Card,
  NumberCard,
  OperatorCard,
  OperatorKind,
  SpecialCard,
} from "@math-high-low/schema";

export class Hand {
  private readonly numbers: NumberCard[] = [];
  private readonly operators: OperatorCard[] = [];
  private readonly specials: SpecialCard[] = [];
  private readonly disabled = new Set<OperatorKind>();

  /** Builds a hand holding the given cards, in order. */
  static of(cards: readonly Card[]): Hand {
    const hand = new Hand();
    for (const card of cards) {
      hand.addCard(card);
    }
    return hand;
  }

  get numberCards(): readonly NumberCard[] {
    return this.numbers;
  }

  get operatorCards(): readonly OperatorCard[] {
    return this.operators;
  }

  get specialCards(): readonly SpecialCard[] {
    return this.specials;
  }

  get disabledOperators(): ReadonlySet<OperatorKind> {
    return this.disabled;
  }

  /** Empties the hand and re-enables every operator. Called at round start. */
  clear(): void {
    this.numbers.length = 0;
    this.operators.length = 0;
    this.specials.length = 0;
    this.disabled.clear();
  }

  addCard(card: Card): void {
    switch (card.kind) {
      case "number":
        this.numbers.push(card);
        return;
      case "operator":
        this.operators.push(card);
        return;
      case "special":
        this.specials.push(card);
        return;
    }
  }

  /** Removes the given card instance. Returns false if it isn't held. */
  removeCard(card: Card): boolean {
    const list: Card[] =
      card.kind === "number"
        ? this.numbers
        : card.kind === "operator"
          ? this.operators
          : this.specials;
    const index = list.indexOf(card);
    if (index === -1) return false;
    list.splice(index, 1);
    return true;
  }

  /** Whether `card` is this exact instance from the hand. */
  holds(card: Card): boolean {
    switch (card.kind) {
      case "number":
        return this.numbers.includes(card);
      case "operator":
        return this.operators.includes(card);
      case "special":
        return this.specials.includes(card);
    }
  }

  /** Multiply operators every valid expression must contain. */
  get requiredMultiplyCount(): number {
    return this.specials.filter((c) => c.special === "forced_multiply").length;
  }

  /** Square roots every valid expression must apply. */
  get requiredRootCount(): number {
    return this.specials.filter((c) => c.special === "unary_root").length;
  }

  isOperatorEnabled(operator: OperatorKind): boolean {
    return !this.disabled.has(operator);
  }

  disableOperator(operator: OperatorKind): void {
    this.disabled.add(operator);
  }

  /** Distinct kinds of the enabled operator cards, in first-held order. */
  availableOperators(): readonly OperatorKind[] {
    const kinds: OperatorKind[] = [];
    for (const card of this.operators) {
      if (this.isOperatorEnabled(card.operator) && !kinds.includes(card.operator)) {
        kinds.push(card.operator);
      }
    }
    return kinds;
  }

  /** Each enabled operator card as its own usable instance, in held order. */
  usableOperatorInstances(): readonly OperatorKind[] {
    return this.operators
      .filter((card) => this.isOperatorEnabled(card.operator))
      .map((card) => card.operator);
  }

  get totalCardCount(): number {
    return this.numbers.length + this.operators.length + this.specials.length;
  }

  isEmpty(): boolean {
    return this.totalCardCount === 0;
  }

  toString(): string {
    return `Hand: ${this.numbers.length} numbers, ${this.operators.length} operators, ${this.specials.length} specials`;
  }
}
