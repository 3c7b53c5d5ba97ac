/**
 * A dense, row-major matrix of numbers, as produced by the inversion routine.
 */
export type Matrix = number[][];

/**
 * A matrix that callers hand in and caches hand out. Nothing holding one of these may write to it.
 */
export type ReadonlyMatrix = readonly (readonly number[])[];

/**
 * The placeholder value of a freshly constructed caching matrix: the 0x0 matrix, which is its own inverse.
 */
export const EMPTY_MATRIX: ReadonlyMatrix = Object.freeze([]);

/**
 * Status codes carried by every error this package throws.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
}
