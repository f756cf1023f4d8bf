/**
 * @file Injectable random sources for probabilistic response gating.
 */

export interface RandomSource {
  /** Uniform value in [0, 1). */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic sequence from a numeric seed. Same seed, same sequence.
 */
export class SeededRandom implements RandomSource {
  private counter: number;

  constructor(seed: number) {
    this.counter = seed;
  }

  next(): number {
    const x = Math.sin(this.counter++ * 9301 + 49297) * 233280;
    return x - Math.floor(x);
  }
}

/** Replays the given values in order, cycling when exhausted. */
export class FixedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {
    if (values.length === 0) {
      throw new RangeError('FixedRandom needs at least one value');
    }
  }

  next(): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value;
  }
}
