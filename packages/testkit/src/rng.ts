/** Deterministic pseudo-random source for seeded property checks. */
export type Rng = Readonly<{
  /** Uniform float in [0, 1). */
  next: () => number;
  /** Uniform integer in [min, max], both inclusive. */
  int: (min: number, max: number) => number;
  pick: <T>(values: readonly T[]) => T | undefined;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
  const int = (min: number, max: number): number => min + Math.floor(next() * (max - min + 1));
  const pick = <T>(values: readonly T[]): T | undefined =>
    values.length === 0 ? undefined : values[int(0, values.length - 1)];
  return Object.freeze({ next, int, pick });
}
