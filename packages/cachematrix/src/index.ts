/**
 * cachematrix - square matrices that memoize their inverse
 *
 * Two caching designs side by side: one whose cache slot any caller may write, and one that
 * decides on its own when to compute, plus the inversion routine and a harness that checks both.
 */

// Caching matrices
export { ExternallyCachedMatrix, computeOrFetchInverse } from './matrix/externally-cached.js';
export { SelfCachingMatrix, selfCachingSolve } from './matrix/self-caching.js';
export type { CachingMatrix, MatrixFactory, InverseAccessor } from './matrix/caching-matrix.js';
export {
	VARIANT_NAMES,
	createVariant,
	externallyCachedVariant,
	isVariantName,
	selfCachingVariant,
} from './matrix/variants.js';
export type { MatrixVariant, VariantName } from './matrix/variants.js';

// Inversion and matrix helpers
export { solve, reciprocalCondition, DEFAULT_TOLERANCE } from './linalg/solve.js';
export type { SolveOptions, Solver } from './linalg/solve.js';
export { dimensions, freezeMatrix, identity, matricesEqual, maxDeviation, multiply } from './linalg/matrix.js';

// Check harness
export {
	DEFAULT_HARNESS_OPTIONS,
	runMatrixChecks,
	runVariantChecks,
	validateHarnessOptions,
} from './harness/matrix-checks.js';
export type { CheckResult, CheckSuite, HarnessOptions, MatrixCheckReport } from './harness/matrix-checks.js';
export { createNormalRandom, createRandom, randomMatrix } from './harness/random.js';
export type { RandomSource } from './harness/random.js';

// Common data types, errors and logging
export { EMPTY_MATRIX, StatusCode } from './common/types.js';
export type { Matrix, ReadonlyMatrix } from './common/types.js';
export { CacheMatrixError, DimensionError, MisuseError, SingularMatrixError } from './common/errors.js';
export { createLogger, disableLogging, enableLogging, isLoggingEnabled } from './common/logger.js';

// Utilities
export { Cached } from './util/cached.js';
