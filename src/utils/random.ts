/** A source of uniform pseudo-random numbers in `[0, 1)`. */
export type RandomSource = () => number

/**
 * Mulberry32: small seedable PRNG, good enough for local search noise.
 */
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Draws one standard normal variate with the Box-Muller transform. */
export function randomNormal(rng: RandomSource): number {
  let u = 0
  let v = 0
  while (u === 0) u = rng()
  while (v === 0) v = rng()
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v)
}

/** Seeds mulberry32 from `seed`, or from `Math.random` when seed is null. */
export function createRandomSource(seed: number | null): RandomSource {
  return mulberry32(seed ?? Math.floor(Math.random() * 0x1_0000_0000))
}
