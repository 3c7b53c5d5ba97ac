import { StatusCode } from './types.js';

/**
 * Base class for cachematrix specific errors
 * Provides status code and cause support
 */
export class CacheMatrixError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'CacheMatrixError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, CacheMatrixError);
		}
	}
}

/**
 * Error thrown by the inversion routine when a matrix is singular, or too close to singular
 * for the requested tolerance
 */
export class SingularMatrixError extends CacheMatrixError {
	/** Reciprocal condition number that tripped the check; 0 for an exactly singular factor */
	public reciprocalCondition?: number;

	constructor(message: string = "Matrix is singular", reciprocalCondition?: number) {
		super(message, StatusCode.ERROR);
		this.name = 'SingularMatrixError';
		this.reciprocalCondition = reciprocalCondition;
		Object.setPrototypeOf(this, SingularMatrixError.prototype);
	}
}

/**
 * Error thrown when matrix dimensions do not fit the operation (non-square, ragged, mismatched)
 */
export class DimensionError extends CacheMatrixError {
	public rows: number;
	public columns: number;

	constructor(message: string, rows: number, columns: number) {
		super(message, StatusCode.MISMATCH);
		this.name = 'DimensionError';
		this.rows = rows;
		this.columns = columns;
		Object.setPrototypeOf(this, DimensionError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends CacheMatrixError {
	constructor(message: string = "API misuse", code: number = StatusCode.MISUSE) {
		super(message, code);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}
