// ─── Dealing ───────────────────────────────────────────────────────
// Fills a hand for a new round: one card of each base operator, a
// fixed number of slot draws, then more draws until the hand holds
// enough number cards. Specials drawn along the way stay in the hand.

import type { GameConfig } from "@math-high-low/schema";
import { operatorCard } from "../engine/cards.js";
import { Hand } from "../engine/hand.js";
import type { SlotDeck } from "./slot-deck.js";

/** Upper bound on slot draws for one hand. */
const MAX_DRAWS_PER_HAND = 256;

export function dealHand(deck: SlotDeck, hand: Hand, config: GameConfig): void {
  hand.clear();

  for (const operator of config.baseOperators) {
    hand.addCard(operatorCard(operator));
  }

  let draws = 0;
  const drawOne = (): void => {
    if (draws >= MAX_DRAWS_PER_HAND) {
      throw new Error(
        `Dealt ${draws} cards without reaching ${config.numberCardsPerHand} number cards`
      );
    }
    hand.addCard(deck.draw());
    draws++;
  };

  for (let i = 0; i < config.initialCardCount; i++) {
    drawOne();
  }
  while (hand.numberCards.length < config.numberCardsPerHand) {
    drawOne();
  }
}

export interface DealtRound {
  readonly playerHand: Hand;
  readonly aiHand: Hand;
  readonly target: number;
  readonly bet: number;
}

/**
 * Rebuilds the deck and deals the player, then the AI from what is
 * left. The target defaults to the first configured value and the
 * bet to the minimum.
 */
export function dealRound(deck: SlotDeck, config: GameConfig): DealtRound {
  deck.rebuild();

  const playerHand = new Hand();
  const aiHand = new Hand();
  dealHand(deck, playerHand, config);
  dealHand(deck, aiHand, config);

  const [target] = config.targetValues;
  if (target === undefined) {
    throw new Error("Game config has no target values");
  }

  return { playerHand, aiHand, target, bet: config.minBet };
}
