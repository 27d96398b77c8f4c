import type { RandomSource } from './types'

/**
 * Non-deterministic source backed by Math.random
 */
export const defaultRandom: RandomSource = () => Math.random()

/**
 * Seeded pseudo-random number generator (mulberry32)
 */
export function mulberry32(seed: number): RandomSource {
	let a = seed | 0
	return (): number => {
		a = (a + 0x6d2b79f5) | 0
		let t = Math.imul(a ^ (a >>> 15), 1 | a)
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296
	}
}
