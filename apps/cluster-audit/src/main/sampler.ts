import { MersenneTwister } from "./mersenne-twister.js";

export const DEFAULT_SAMPLE_SIZE = 1000;
export const DEFAULT_SEED = 1;

export interface Sampler {
  readonly seed: number;
  /** Distinct positions in [0, populationSize), ascending. */
  sampleIndices: (populationSize: number, k: number) => number[];
  /** Subset of `population` in its original relative order. */
  sample: <T>(population: readonly T[], k: number) => T[];
}

const assertCount = (value: number, label: string): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Invalid ${label}: expected a non-negative integer, got ${value}`);
  }
};

// Small populations are drawn from a shrinking pool, large ones by rejecting repeats.
const poolThreshold = (k: number): number => {
  let setsize = 21;
  if (k > 5) {
    setsize += 4 ** Math.ceil(Math.log(k * 3) / Math.log(4));
  }
  return setsize;
};

const drawFromPool = (rng: MersenneTwister, n: number, k: number): number[] => {
  const pool = Array.from({ length: n }, (_, i) => i);
  const chosen: number[] = [];
  for (let i = 0; i < k; i += 1) {
    const j = rng.randBelow(n - i);
    chosen.push(pool[j]);
    pool[j] = pool[n - i - 1];
  }
  return chosen;
};

const drawWithRejection = (rng: MersenneTwister, n: number, k: number): number[] => {
  const selected = new Set<number>();
  while (selected.size < k) {
    selected.add(rng.randBelow(n));
  }
  return [...selected];
};

/**
 * Uniform sampling without replacement from one seeded generator.
 * Every call advances the same stream, so the sequence of calls in a run is reproducible.
 */
export const createSampler = (seed: number = DEFAULT_SEED): Sampler => {
  const rng = new MersenneTwister(seed);

  const sampleIndices = (populationSize: number, k: number): number[] => {
    assertCount(populationSize, "population size");
    assertCount(k, "sample size");
    if (k >= populationSize) {
      return Array.from({ length: populationSize }, (_, i) => i);
    }
    if (k === 0) return [];
    const chosen =
      populationSize <= poolThreshold(k)
        ? drawFromPool(rng, populationSize, k)
        : drawWithRejection(rng, populationSize, k);
    return chosen.sort((a, b) => a - b);
  };

  const sample = <T>(population: readonly T[], k: number): T[] =>
    sampleIndices(population.length, k).map((index) => population[index]);

  return { seed, sampleIndices, sample };
};

export const sample = <T>(population: readonly T[], k: number, seed: number = DEFAULT_SEED): T[] =>
  createSampler(seed).sample(population, k);
