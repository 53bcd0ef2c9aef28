/**
 * Deterministic pseudo-random source for property-style tests.
 *
 * Linear congruential generator (Numerical Recipes constants). Same seed,
 * same sequence, on every platform.
 */
export type Rng = Readonly<{
  /** Uniform float in [0, 1). */
  next: () => number;
  /** Uniform integer in [min, max] (inclusive). */
  int: (min: number, max: number) => number;
  /** Uniformly picked element of a non-empty array. */
  pick: <T>(values: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
  const int = (min: number, max: number): number => min + Math.floor(next() * (max - min + 1));
  const pick = <T>(values: readonly T[]): T => {
    const value = values[int(0, values.length - 1)];
    if (value === undefined) {
      throw new Error("createRng.pick: values must not be empty");
    }
    return value;
  };
  return Object.freeze({ next, int, pick });
}

/** Run `fn` with a seeded rng, tagging any failure with the seed that produced it. */
export function withSeed<T>(label: string, seed: number, fn: (rng: Rng) => T): T {
  try {
    return fn(createRng(seed));
  } catch (error) {
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    throw new Error(`[${label}] seed=${String(seed)} failed: ${detail}`);
  }
}
