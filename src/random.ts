import seedrandom from 'seedrandom'

/** Uniform draws in [0, 1). Every random choice the agents make goes through one of these. */
export interface RandomSource {
  next(): number
}

/** Seeded source backed by seedrandom; without a seed it is seeded from the system entropy pool */
export function createRandom(seed?: number | string): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(String(seed))
  return { next: () => prng() }
}

/** Uniform integer in [0, n) */
export function randomInt(rng: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(rng.next() * n))
}

/** Uniform pick from a non-empty list */
export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('Cannot pick from an empty list')
  return items[randomInt(rng, items.length)]
}
