/**
 * Seedable random source for mine placement.
 */

import { randomInt } from 'node:crypto'

/** Returns floats in [0, 1). */
export type RandomSource = () => number

/** Mulberry32: small, fast, deterministic for a given 32-bit seed. */
export function createRng(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function entropySeed(): number {
  return randomInt(0, 2 ** 32)
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const tmp = result[i]
    result[i] = result[j]
    result[j] = tmp
  }
  return result
}
