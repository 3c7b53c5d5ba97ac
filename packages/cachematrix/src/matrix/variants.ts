import { MisuseError } from '../common/errors.js';
import type { ReadonlyMatrix } from '../common/types.js';
import { solve, type SolveOptions, type Solver } from '../linalg/solve.js';
import type { CachingMatrix } from './caching-matrix.js';
import { computeOrFetchInverse, ExternallyCachedMatrix } from './externally-cached.js';
import { SelfCachingMatrix, selfCachingSolve } from './self-caching.js';

export const VARIANT_NAMES = ['externally-cached', 'self-caching'] as const;

export type VariantName = typeof VARIANT_NAMES[number];

/**
 * One caching design bound to an inversion routine, ready for the check harness.
 *
 * `invert` is only ever handed matrices built by the same variant's `make`.
 */
export interface MatrixVariant<M extends CachingMatrix = CachingMatrix> {
	readonly name: VariantName;
	make(value: ReadonlyMatrix): M;
	invert(matrix: M, options?: SolveOptions): ReadonlyMatrix;
}

export function externallyCachedVariant(solver: Solver = solve): MatrixVariant<ExternallyCachedMatrix> {
	return {
		name: 'externally-cached',
		make: value => new ExternallyCachedMatrix(value),
		invert: (matrix, options) => computeOrFetchInverse(matrix, options, solver),
	};
}

export function selfCachingVariant(solver: Solver = solve): MatrixVariant<SelfCachingMatrix> {
	return {
		name: 'self-caching',
		make: value => new SelfCachingMatrix(value, solver),
		invert: selfCachingSolve,
	};
}

export function isVariantName(name: string): name is VariantName {
	return VARIANT_NAMES.some(variant => variant === name);
}

/**
 * Looks a variant up by name.
 *
 * @throws MisuseError for an unknown name
 */
export function createVariant(name: string, solver: Solver = solve): MatrixVariant {
	if (!isVariantName(name)) {
		throw new MisuseError(`Unknown matrix variant '${name}' (expected one of: ${VARIANT_NAMES.join(', ')})`);
	}
	switch (name) {
		case 'externally-cached': return externallyCachedVariant(solver);
		case 'self-caching': return selfCachingVariant(solver);
	}
}
