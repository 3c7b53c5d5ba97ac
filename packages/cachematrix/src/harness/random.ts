import type { Matrix } from '../common/types.js';

export type RandomSource = () => number;

/**
 * Seeded uniform generator on [0, 1) (mulberry32). Same seed, same sequence.
 */
export function createRandom(seed: number): RandomSource {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Standard normal deviates from a uniform source (Box-Muller, one deviate per pair).
 */
export function createNormalRandom(uniform: RandomSource): RandomSource {
	return () => {
		const u1 = 1 - uniform();	// (0, 1]: keeps log finite
		const u2 = uniform();
		return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
	};
}

export function randomMatrix(size: number, random: RandomSource): Matrix {
	return Array.from({ length: size }, () =>
		Array.from({ length: size }, () => random())
	);
}
