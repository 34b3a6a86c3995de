import seedrandom from "seedrandom";

/**
 * Source of uniformly distributed floats in [0, 1).
 * Injected wherever randomness is needed so runs can be replayed.
 */
export interface RandomSource {
  float(): number;
}

/**
 * Seeded RNG backed by seedrandom.
 */
export class SeededRandom implements RandomSource {
  public readonly seed: string;
  private readonly rng: seedrandom.PRNG;

  constructor(seed?: string) {
    this.seed = seed ?? `rat-${Date.now()}`;
    this.rng = seedrandom(this.seed);
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public float(): number {
    return this.rng();
  }
}

/**
 * Shared utility for unseeded random values outside the simulation core.
 */
export class RandomUtils {
  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return Math.random();
  }
}
