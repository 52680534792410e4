import seedrandom from "seedrandom";

/**
 * Seeded random source; the same seed replays the same draws
 */
export class SeededRNG {
  private rng: () => number;

  constructor(seed: string) {
    this.rng = seedrandom(seed);
  }

  next(): number {
    return this.rng();
  }

  /**
   * Integer in [min, max], both inclusive
   */
  nextInt(min: number, max: number): number {
    min = Math.ceil(min);
    max = Math.floor(max);
    return Math.floor(this.rng() * (max - min + 1)) + min;
  }

  /**
   * Normal draw via Box-Muller
   */
  nextGaussian(mean: number, standardDeviation: number): number {
    // 1 - u keeps the log argument in (0, 1]
    const u = 1 - this.rng();
    const v = this.rng();
    const z = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    return mean + z * standardDeviation;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[this.nextInt(0, items.length - 1)];
  }

  /**
   * Fisher-Yates shuffle into a new array
   */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }
}
