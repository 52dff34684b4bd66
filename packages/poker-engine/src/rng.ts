/** Randomness source for dealing. Callers own it so hands stay reproducible. */
export interface Rng {
  nextU32(): number;
  /** Uniform-ish integer in [minInclusive, maxExclusive). */
  int(minInclusive: number, maxExclusive: number): number;
}

// Deterministic PRNG. Do NOT use Math.random() for dealing.
export class Mulberry32 implements Rng {
  private a: number;

  constructor(seed: number) {
    this.a = seed >>> 0;
    if (this.a === 0) this.a = 0x6d2b79f5; // avoid a trivial all-zero seed state
  }

  nextU32(): number {
    let t = (this.a = (this.a + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  int(minInclusive: number, maxExclusive: number): number {
    if (!Number.isInteger(minInclusive) || !Number.isInteger(maxExclusive)) {
      throw new RangeError("Rng.int bounds must be integers");
    }
    if (maxExclusive <= minInclusive) {
      throw new RangeError("Rng.int maxExclusive must be > minInclusive");
    }
    return minInclusive + (this.nextU32() % (maxExclusive - minInclusive));
  }
}

export function shuffleInPlace<T>(arr: T[], rng: Rng): void {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.int(0, i + 1);
    const a = arr[i];
    const b = arr[j];
    if (a === undefined || b === undefined) continue;
    arr[i] = b;
    arr[j] = a;
  }
}
