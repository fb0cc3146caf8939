// ─── Expression ────────────────────────────────────────────────────
// An alternating sequence of terms and binary operators, e.g.
// √4 × 3 + 2 → terms [(4, root), (3), (2)], operators [×, +].
// Structural only: callers enforce game legality.

import type { OperatorKind } from "@math-high-low/schema";
import { operatorSymbol } from "./cards.js";

/** One number in an expression and whether a square root applies to it. */
export interface Term {
  readonly value: number;
  readonly hasRoot: boolean;
}

export class Expression {
  private readonly termList: Term[] = [];
  private readonly operatorList: OperatorKind[] = [];

  /** Builds an expression from parallel term and operator lists. */
  static from(
    terms: readonly Term[],
    operators: readonly OperatorKind[]
  ): Expression {
    const expression = new Expression();
    for (const term of terms) {
      expression.addNumber(term.value, term.hasRoot);
    }
    for (const operator of operators) {
      expression.addOperator(operator);
    }
    return expression;
  }

  get terms(): readonly Term[] {
    return this.termList;
  }

  get operators(): readonly OperatorKind[] {
    return this.operatorList;
  }

  addNumber(value: number, hasRoot = false): void {
    this.termList.push({ value, hasRoot });
  }

  addOperator(operator: OperatorKind): void {
    this.operatorList.push(operator);
  }

  /**
   * Undoes the last addition: the trailing operator when one is
   * waiting for its right operand, otherwise the last number.
   */
  removeLast(): void {
    if (
      this.operatorList.length > 0 &&
      this.operatorList.length === this.termList.length - 1
    ) {
      this.operatorList.pop();
    } else if (this.termList.length > 0) {
      this.termList.pop();
    }
  }

  clear(): void {
    this.termList.length = 0;
    this.operatorList.length = 0;
  }

  isEmpty(): boolean {
    return this.termList.length === 0;
  }

  isComplete(): boolean {
    return (
      this.termList.length > 0 &&
      this.operatorList.length === this.termList.length - 1
    );
  }

  /** True before the first number and after every operator. */
  expectingNumber(): boolean {
    return this.termList.length === this.operatorList.length;
  }

  /** Number of terms carrying a square root. */
  get rootCount(): number {
    return this.termList.filter((t) => t.hasRoot).length;
  }

  /** Number of Multiply operators. */
  get multiplyCount(): number {
    return this.operatorList.filter((op) => op === "multiply").length;
  }

  clone(): Expression {
    return Expression.from(this.termList, this.operatorList);
  }

  /** Renders e.g. "√4 × 3 + 2"; numbers keep at most two decimals. */
  toDisplayString(): string {
    return this.termList
      .map((term, i) => {
        const text = `${term.hasRoot ? "√" : ""}${formatNumber(term.value)}`;
        const operator = this.operatorList[i];
        return operator === undefined ? text : `${text} ${operatorSymbol(operator)} `;
      })
      .join("");
  }

  toString(): string {
    return `Expression: ${this.toDisplayString()}`;
  }
}

function formatNumber(value: number): string {
  return String(Number(value.toFixed(2)));
}
