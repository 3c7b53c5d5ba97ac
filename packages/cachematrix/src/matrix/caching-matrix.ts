import type { ReadonlyMatrix } from '../common/types.js';
import type { SolveOptions } from '../linalg/solve.js';

/**
 * What both caching designs share: a replaceable matrix value.
 *
 * Replacing the value always discards any inverse held for the previous one.
 */
export interface CachingMatrix {
	setValue(value: ReadonlyMatrix): void;
	getValue(): ReadonlyMatrix;
}

/** Builds a caching matrix around an initial value. */
export type MatrixFactory<M extends CachingMatrix> = (value: ReadonlyMatrix) => M;

/** Obtains the inverse of a caching matrix, forwarding solver options. */
export type InverseAccessor<M extends CachingMatrix> = (matrix: M, options?: SolveOptions) => ReadonlyMatrix;
