// ─── Slot Deck ─────────────────────────────────────────────────────
// The shared draw pile: number cards 0..10 plus this round's special
// cards, shuffled. Draws hand out clones so the pile's cards are
// never shared with a hand.

import {
  MAX_NUMBER_VALUE,
  MIN_NUMBER_VALUE,
  type Card,
  type GameConfig,
  type NumberCard,
} from "@math-high-low/schema";
import { cloneCard, numberCard, specialCard } from "../engine/cards.js";
import { DeckRandom } from "./prng.js";

export class SlotDeck {
  private readonly cards: Card[] = [];
  private readonly random: DeckRandom;

  constructor(
    private readonly config: GameConfig,
    seed?: number
  ) {
    this.random = new DeckRandom(seed);
  }

  /** Discards whatever is left and builds a freshly shuffled pile. */
  rebuild(): void {
    this.cards.length = 0;

    for (let value = MIN_NUMBER_VALUE; value <= MAX_NUMBER_VALUE; value++) {
      for (let copy = 0; copy < this.config.numberCopiesPerValue; copy++) {
        this.cards.push(numberCard(value));
      }
    }
    for (let i = 0; i < this.config.multiplyCardsPerRound; i++) {
      this.cards.push(specialCard("forced_multiply"));
    }
    for (let i = 0; i < this.config.squareRootCardsPerRound; i++) {
      this.cards.push(specialCard("unary_root"));
    }

    this.random.shuffleInPlace(this.cards);
  }

  /** Draws from the top, rebuilding the pile first when it is empty. */
  draw(): Card {
    if (this.cards.length === 0) {
      this.rebuild();
    }
    const card = this.cards.pop();
    if (card === undefined) {
      throw new Error("Slot deck is empty after rebuild");
    }
    return cloneCard(card);
  }

  /** A number card with a uniformly random value, independent of the pile. */
  drawRandomNumberCard(): NumberCard {
    return numberCard(this.random.nextInt(MAX_NUMBER_VALUE - MIN_NUMBER_VALUE + 1) + MIN_NUMBER_VALUE);
  }

  get remaining(): number {
    return this.cards.length;
  }
}
