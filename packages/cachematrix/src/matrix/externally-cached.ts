import { createLogger } from '../common/logger.js';
import { EMPTY_MATRIX, type ReadonlyMatrix } from '../common/types.js';
import { freezeMatrix } from '../linalg/matrix.js';
import { solve, type SolveOptions, type Solver } from '../linalg/solve.js';
import type { CachingMatrix } from './caching-matrix.js';

const log = createLogger('matrix:external');

/**
 * A matrix paired with a slot for its inverse that anyone may fill.
 *
 * The value is copied and frozen on the way in, so it changes only through {@link setValue}, which
 * also empties the slot. Filling the slot is left to
 * {@link computeOrFetchInverse}, or to any other caller, and nothing checks what they put there.
 * Prefer {@link SelfCachingMatrix}, which offers no way to write the slot.
 */
export class ExternallyCachedMatrix implements CachingMatrix {
	private value: ReadonlyMatrix;
	private cachedInverse: ReadonlyMatrix | undefined;

	constructor(value: ReadonlyMatrix = EMPTY_MATRIX) {
		this.value = freezeMatrix(value);
	}

	setValue(value: ReadonlyMatrix): void {
		const frozen = freezeMatrix(value);
		this.cachedInverse = undefined;
		this.value = frozen;
		log('Value replaced, cached inverse cleared');
	}

	getValue(): ReadonlyMatrix {
		return this.value;
	}

	/**
	 * Overwrites the cached inverse.
	 *
	 * Known defect: `candidate` is stored as given. Nothing verifies that it is the inverse of the
	 * current value, so a buggy caller can leave this object reporting a wrong inverse until the next
	 * {@link setValue}.
	 */
	setCachedInverse(candidate: ReadonlyMatrix): void {
		this.cachedInverse = candidate;
	}

	/**
	 * Returns whatever was last stored, or `undefined` right after construction or {@link setValue}.
	 * Callers that skip {@link computeOrFetchInverse} must expect `undefined` here.
	 */
	getCachedInverse(): ReadonlyMatrix | undefined {
		return this.cachedInverse;
	}
}

/**
 * Returns the inverse held by `matrix`, computing and storing it first when the slot is empty.
 *
 * Trusts the slot completely: an inconsistent inverse written through `setCachedInverse` is returned
 * as if it were correct.
 *
 * @param options Handed to `solver` unchanged
 * @param solver Inversion routine used on a cache miss
 */
export function computeOrFetchInverse(
	matrix: ExternallyCachedMatrix,
	options?: SolveOptions,
	solver: Solver = solve
): ReadonlyMatrix {
	let inverse = matrix.getCachedInverse();
	if (inverse === undefined) {
		const value = matrix.getValue();
		log('Computing inverse of %dx%d matrix', value.length, value[0]?.length ?? 0);
		inverse = solver(value, options);
		matrix.setCachedInverse(inverse);
	}
	return inverse;
}
