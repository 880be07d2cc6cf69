/**
 * Seeded pseudo-random source shared by the weather station and the disease
 * monitor. The simulation never touches `Math.random` so a run is fully
 * reproducible from its configured seed.
 *
 * The generator is the Park–Miller LCG (modulus 2^31-1, multiplier 48271).
 */
export type RandomSource = () => number;

const MODULUS = 2147483647;
const MULTIPLIER = 48271;

/**
 * Folds a numeric or textual seed into a strictly positive 31-bit state. Text
 * tokens go through a polynomial rolling hash so tests can use readable seeds.
 */
export function deriveSeed(seed: number | string): number {
  let state: number;
  if (typeof seed === "number") {
    state = Number.isFinite(seed) ? Math.floor(Math.abs(seed)) % MODULUS : 0;
  } else {
    state = 0;
    for (let index = 0; index < seed.length; index += 1) {
      state = (state * 31 + seed.charCodeAt(index)) % MODULUS;
    }
  }
  return state === 0 ? 1 : state;
}

/** Returns a generator yielding values in `[0, 1)`. */
export function createSeededRandom(seed: number | string): RandomSource {
  let state = deriveSeed(seed);
  return () => {
    state = (state * MULTIPLIER) % MODULUS;
    return (state - 1) / (MODULUS - 1);
  };
}

/** Uniform draw in `[min, max)` using the provided source. */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}
