import seedrandom from "seedrandom";

/**
 * Process-wide seeded generator. Randomized loop tests reseed it so a
 * failing run can be replayed; log ids draw from it too.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom();

  /** Without a seed the generator is auto-seeded again. */
  public static seed(seed?: string): void {
    RandomUtils.rng = seed === undefined ? seedrandom() : seedrandom(seed);
  }

  /** In [0, 1). */
  public static float(): number {
    return RandomUtils.rng();
  }

  /** Both bounds inclusive. */
  public static intRange(min: number, max: number): number {
    return min + Math.floor(RandomUtils.rng() * (max - min + 1));
  }

  public static chance(probability: number): boolean {
    return RandomUtils.rng() < probability;
  }

  public static element<T>(items: readonly T[]): T | undefined {
    return items.length === 0
      ? undefined
      : items[Math.floor(RandomUtils.rng() * items.length)];
  }
}
