// ─── Card Helpers ──────────────────────────────────────────────────
// Per-variant behavior for the closed Card union. Every switch is
// exhaustive over `kind`, so adding a variant fails to compile here.

import {
  MAX_NUMBER_VALUE,
  MIN_NUMBER_VALUE,
  type Card,
  type CardType,
  type NumberCard,
  type OperatorCard,
  type OperatorKind,
  type SpecialCard,
  type SpecialKind,
} from "@math-high-low/schema";

// ─── Factories ─────────────────────────────────────────────────────

/** Creates a number card, clamping the value into 0..10. */
export function numberCard(value: number): NumberCard {
  const clamped = Math.min(MAX_NUMBER_VALUE, Math.max(MIN_NUMBER_VALUE, Math.round(value)));
  return { kind: "number", value: clamped };
}

export function operatorCard(operator: OperatorKind): OperatorCard {
  return { kind: "operator", operator };
}

export function specialCard(special: SpecialKind): SpecialCard {
  return { kind: "special", special, consumed: false };
}

/** Returns an independent copy; special cards come back unconsumed. */
export function cloneCard(card: Card): Card {
  switch (card.kind) {
    case "number":
      return { kind: "number", value: card.value };
    case "operator":
      return { kind: "operator", operator: card.operator };
    case "special":
      return specialCard(card.special);
  }
}

// ─── Display ───────────────────────────────────────────────────────

export function operatorSymbol(operator: OperatorKind): string {
  switch (operator) {
    case "add":
      return "+";
    case "subtract":
      return "-";
    case "multiply":
      return "×";
    case "divide":
      return "÷";
  }
}

export function specialSymbol(special: SpecialKind): string {
  switch (special) {
    case "forced_multiply":
      return "×";
    case "unary_root":
      return "√";
  }
}

export function cardDisplayText(card: Card): string {
  switch (card.kind) {
    case "number":
      return String(card.value);
    case "operator":
      return operatorSymbol(card.operator);
    case "special":
      return specialSymbol(card.special);
  }
}

export function cardType(card: Card): CardType {
  switch (card.kind) {
    case "number":
      return "Number";
    case "operator":
      return "Operator";
    case "special":
      return "Special";
  }
}

export function isSameCardType(a: Card, b: Card): boolean {
  return a.kind === b.kind;
}

// ─── Operators ─────────────────────────────────────────────────────

/** Multiply/Divide bind tighter (2) than Add/Subtract (1). */
export function operatorPrecedence(operator: OperatorKind): 1 | 2 {
  switch (operator) {
    case "multiply":
    case "divide":
      return 2;
    case "add":
    case "subtract":
      return 1;
  }
}

// ─── Special Cards ─────────────────────────────────────────────────

/** A root applies to a single number; forced multiply sits between two. */
export function isUnarySpecial(card: SpecialCard): boolean {
  return card.special === "unary_root";
}

export function consumeSpecialCard(card: SpecialCard): void {
  card.consumed = true;
}

export function resetSpecialCard(card: SpecialCard): void {
  card.consumed = false;
}
