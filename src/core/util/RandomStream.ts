export interface RandomSource {
  /** Returns an integer in `[0, bound)`. */
  nextBelow(bound: number): number;
}

/**
 * Seedable linear congruential generator, so runs that use random replacement can be replayed.
 */
export class RandomStream implements RandomSource {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  nextInt(): number {
    this.state = (1664525 * this.state + 1013904223) >>> 0;
    return this.state;
  }

  nextBelow(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new RangeError(`Random bound must be a positive integer: ${bound}`);
    }
    // High bits of an LCG are better distributed than the low ones.
    return Math.floor((this.nextInt() / 0x1_0000_0000) * bound);
  }
}
