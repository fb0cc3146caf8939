// ─── Card Primitives ───────────────────────────────────────────────
// The three card variants dealt to each side: numbers, base operators,
// and special cards that impose mandatory usage on the expression.
// Closed discriminated union on `kind`.

/** The four binary operators an expression can use. */
export type OperatorKind = "add" | "subtract" | "multiply" | "divide";

/** All operator kinds in canonical order. */
export const OPERATOR_KINDS: readonly OperatorKind[] = [
  "add",
  "subtract",
  "multiply",
  "divide",
];

/**
 * Special card effects.
 * `forced_multiply` requires one Multiply operator in the expression;
 * `unary_root` requires one square root applied to a number.
 */
export type SpecialKind = "forced_multiply" | "unary_root";

export const SPECIAL_KINDS: readonly SpecialKind[] = [
  "forced_multiply",
  "unary_root",
];

/** Lowest and highest face value of a number card. */
export const MIN_NUMBER_VALUE = 0;
export const MAX_NUMBER_VALUE = 10;

export interface NumberCard {
  readonly kind: "number";
  /** Face value in [MIN_NUMBER_VALUE, MAX_NUMBER_VALUE]. */
  readonly value: number;
}

export interface OperatorCard {
  readonly kind: "operator";
  readonly operator: OperatorKind;
}

export interface SpecialCard {
  readonly kind: "special";
  readonly special: SpecialKind;
  /** Set once the card has been applied to the expression this round. */
  consumed: boolean;
}

/** Any card that can sit in a hand. */
export type Card = NumberCard | OperatorCard | SpecialCard;

/** Display category of a card. */
export type CardType = "Number" | "Operator" | "Special";
