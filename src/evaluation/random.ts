/**
 * Random number helpers for the evaluation harness
 * @module evaluation/random
 */

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number

/**
 * Simple seeded random number generator (31-bit linear congruential).
 * The same seed always yields the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let state = Math.floor(Math.abs(seed)) & 0x7fffffff
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff
    return state / 0x80000000
  }
}

/**
 * Returns an integer in [min, max], both inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}

/**
 * Picks one element uniformly. The array must not be empty.
 */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)]
}

/**
 * Returns a bigint in [0, bound). Draws 32 bits at a time, so it also covers
 * IPv6-sized ranges.
 */
export function randomBigIntBelow(random: RandomSource, bound: bigint): bigint {
  if (bound <= 1n) {
    return 0n
  }
  let value = 0n
  for (let span = 1n; span < bound; span <<= 32n) {
    value = (value << 32n) | BigInt(Math.floor(random() * 0x100000000))
  }
  return value % bound
}

/**
 * Returns a shuffled copy (Fisher-Yates).
 */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    ;[result[i], result[j]] = [result[j], result[i]]
  }
  return result
}
