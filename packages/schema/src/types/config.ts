// ─── Game Configuration ────────────────────────────────────────────
// Balance knobs for dealing and betting. Validated at the parse
// boundary in schema/game-config.ts.

import type { OperatorKind } from "./card.js";

export interface GameConfig {
  /** Copies of each number value 0..10 in the slot deck. */
  readonly numberCopiesPerValue: number;
  /** ForcedMultiply cards shuffled into each rebuilt slot deck. */
  readonly multiplyCardsPerRound: number;
  /** UnaryRoot cards shuffled into each rebuilt slot deck. */
  readonly squareRootCardsPerRound: number;
  /** Slot cards drawn unconditionally at the start of a deal. */
  readonly initialCardCount: number;
  /** Number cards every hand must hold once dealing finishes. */
  readonly numberCardsPerHand: number;
  /** One operator card of each kind is handed out before drawing. */
  readonly baseOperators: readonly OperatorKind[];
  readonly minBet: number;
  readonly maxBet: number;
  /** Selectable targets; the first is the default for a new round. */
  readonly targetValues: readonly number[];
}
