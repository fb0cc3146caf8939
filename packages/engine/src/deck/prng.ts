// ─── Seeded PRNG ───────────────────────────────────────────────────
// Deterministic randomness for dealing, so a seed reproduces a round.

/** mulberry32: a small 32-bit seeded generator of floats in [0, 1). */
function mulberry32(seed: number): () => number {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class DeckRandom {
  private readonly next: () => number;

  /** Without a seed, draws one from Math.random. */
  constructor(seed?: number) {
    this.next = mulberry32(seed ?? Math.floor(Math.random() * 2 ** 32));
  }

  /**
   * Integer in [0, maxExclusive).
   * @throws {RangeError} if maxExclusive is not a positive safe integer.
   */
  nextInt(maxExclusive: number): number {
    if (!Number.isSafeInteger(maxExclusive) || maxExclusive <= 0) {
      throw new RangeError(`maxExclusive must be a positive integer, got ${maxExclusive}`);
    }
    return Math.floor(this.next() * maxExclusive);
  }

  /** Fisher-Yates, end to start, in place. */
  shuffleInPlace<T>(items: T[]): void {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const a = items[i];
      const b = items[j];
      if (a === undefined || b === undefined) continue;
      items[i] = b;
      items[j] = a;
    }
  }
}
