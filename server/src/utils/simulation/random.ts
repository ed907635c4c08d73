/**
 * Seeded pseudo-random generator.
 *
 * A linear congruential generator over 32-bit state. Every simulation run
 * constructs its own instance, so runs never share random state and the same
 * seed always replays the same race.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // Fold any finite number into the 32-bit state space, then scramble it so
    // consecutive seeds start far apart
    this.state = mixSeed(((Math.floor(seed) % 4294967296) + 4294967296) % 4294967296);
  }

  /** Uniform in [0, 1) */
  next(): number {
    this.state = (this.state * 1664525 + 1013904223) % 4294967296;
    return this.state / 4294967296;
  }

  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /** Normal draw (Box–Muller, one value per two uniforms) */
  normal(mean: number, stddev: number): number {
    if (stddev <= 0) return mean;
    const u1 = 1 - this.next(); // (0, 1] keeps log finite
    const u2 = this.next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * stddev;
  }

  /**
   * Draw `count` distinct values from `pool` without replacement
   * (partial Fisher–Yates). The pool is not modified.
   */
  sample<T>(pool: readonly T[], count: number): T[] {
    const arr = pool.slice();
    const n = Math.min(count, arr.length);
    for (let i = 0; i < n; i++) {
      const j = this.int(i, arr.length - 1);
      const tmp = arr[i];
      arr[i] = arr[j];
      arr[j] = tmp;
    }
    return arr.slice(0, n);
  }
}

/** murmur3 32-bit finaliser; a bijection on [0, 2^32) with mixSeed(0) = 0 */
export function mixSeed(seed: number): number {
  let h = seed >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}
