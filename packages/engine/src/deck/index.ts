export { SlotDeck } from "./slot-deck.js";
export { DeckRandom } from "./prng.js";
export { dealHand, dealRound, type DealtRound } from "./dealing.js";
