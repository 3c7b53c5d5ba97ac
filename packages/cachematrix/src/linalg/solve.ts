import { LuDecomposition, Matrix as MlMatrix, SingularValueDecomposition } from 'ml-matrix';
import { createLogger } from '../common/logger.js';
import { DimensionError, SingularMatrixError } from '../common/errors.js';
import type { Matrix, ReadonlyMatrix } from '../common/types.js';
import { dimensions, toMlMatrix } from './matrix.js';

const log = createLogger('solve');

/**
 * Named parameters understood by {@link solve}.
 *
 * The caching matrices hand these to their solver untouched, so a custom solver may accept more.
 */
export interface SolveOptions {
	/**
	 * Reciprocal condition number below which the matrix is reported as computationally singular.
	 * Defaults to {@link DEFAULT_TOLERANCE}.
	 */
	tolerance?: number;
}

/**
 * The inversion routine both caching designs delegate to.
 */
export type Solver = (value: ReadonlyMatrix, options?: SolveOptions) => Matrix;

/** Machine epsilon, the same default threshold classic linear algebra packages apply. */
export const DEFAULT_TOLERANCE = Number.EPSILON;

/**
 * Inverts a square matrix.
 *
 * The inverse comes from an LU decomposition with partial pivoting solved against the identity.
 * Conditioning is judged separately from the singular values, so a matrix whose factorization
 * succeeds can still be rejected by a stricter `tolerance`.
 *
 * @throws DimensionError if the matrix is ragged or not square
 * @throws SingularMatrixError if the matrix is singular or its reciprocal condition number is below the tolerance
 */
export function solve(value: ReadonlyMatrix, options?: SolveOptions): Matrix {
	const [rows, columns] = dimensions(value);
	if (rows !== columns) {
		throw new DimensionError(`Matrix must be square to invert, got ${rows}x${columns}`, rows, columns);
	}
	if (rows === 0) {
		return [];
	}

	const matrix = toMlMatrix(value);
	const lu = new LuDecomposition(matrix);
	if (lu.isSingular()) {
		log('LU factor of %dx%d matrix has a zero pivot', rows, columns);
		throw new SingularMatrixError('Matrix is exactly singular', 0);
	}

	const tolerance = options?.tolerance ?? DEFAULT_TOLERANCE;
	const rcond = reciprocalCondition(matrix);
	log('Reciprocal condition number %d (tolerance %d)', rcond, tolerance);
	if (rcond < tolerance) {
		throw new SingularMatrixError(
			`System is computationally singular: reciprocal condition number = ${rcond.toExponential(6)}`,
			rcond
		);
	}

	return lu.solve(MlMatrix.eye(rows)).to2DArray();
}

/**
 * Ratio of the smallest to the largest singular value; 0 for a singular matrix.
 */
export function reciprocalCondition(matrix: MlMatrix): number {
	const svd = new SingularValueDecomposition(matrix, {
		computeLeftSingularVectors: false,
		computeRightSingularVectors: false,
	});
	const condition = svd.condition;
	return Number.isFinite(condition) ? 1 / condition : 0;
}
