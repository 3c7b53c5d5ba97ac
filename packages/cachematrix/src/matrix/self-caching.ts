import { createLogger } from '../common/logger.js';
import { EMPTY_MATRIX, type ReadonlyMatrix } from '../common/types.js';
import { Cached } from '../util/cached.js';
import { freezeMatrix } from '../linalg/matrix.js';
import { solve, type SolveOptions, type Solver } from '../linalg/solve.js';
import type { CachingMatrix } from './caching-matrix.js';

const log = createLogger('matrix:self-caching');

/**
 * A matrix that caches its own inverse.
 *
 * The inverse can only be obtained through {@link getInverse}, which computes it on the first call
 * after construction or {@link setValue} and returns the stored result afterwards. The value is
 * copied on the way in and both value and inverse are frozen, so no outside reference can bring the
 * pair out of step.
 *
 * Not safe for concurrent use from several workers sharing one instance.
 */
export class SelfCachingMatrix implements CachingMatrix {
	private value: ReadonlyMatrix;
	private readonly inverse: Cached<ReadonlyMatrix, [options?: SolveOptions]>;

	constructor(value: ReadonlyMatrix = EMPTY_MATRIX, private readonly solver: Solver = solve) {
		this.value = freezeMatrix(value);
		this.inverse = new Cached((options?: SolveOptions) => {
			log('Computing inverse of %dx%d matrix', this.value.length, this.value[0]?.length ?? 0);
			return freezeMatrix(this.solver(this.value, options));
		});
	}

	setValue(value: ReadonlyMatrix): void {
		const frozen = freezeMatrix(value);
		this.inverse.clear();
		this.value = frozen;
		log('Value replaced, cached inverse cleared');
	}

	getValue(): ReadonlyMatrix {
		return this.value;
	}

	/**
	 * Returns the inverse of the current value.
	 *
	 * `options` reach the solver only when the inverse is computed; a held inverse is returned as-is.
	 * Solver errors propagate and leave nothing cached.
	 */
	getInverse(options?: SolveOptions): ReadonlyMatrix {
		if (this.inverse.hasValue) {
			log('Returning cached inverse');
		}
		return this.inverse.get(options);
	}

	/** Whether the next {@link getInverse} returns without computing. */
	get hasCachedInverse(): boolean {
		return this.inverse.hasValue;
	}
}

/**
 * {@link SelfCachingMatrix.getInverse} as a free function, matching the shape of `computeOrFetchInverse`.
 */
export function selfCachingSolve(matrix: SelfCachingMatrix, options?: SolveOptions): ReadonlyMatrix {
	return matrix.getInverse(options);
}
