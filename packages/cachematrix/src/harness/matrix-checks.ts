import { createLogger } from '../common/logger.js';
import { MisuseError } from '../common/errors.js';
import { StatusCode, type ReadonlyMatrix } from '../common/types.js';
import { identity, matricesEqual, maxDeviation, multiply } from '../linalg/matrix.js';
import type { CachingMatrix, InverseAccessor, MatrixFactory } from '../matrix/caching-matrix.js';
import type { MatrixVariant } from '../matrix/variants.js';
import { createNormalRandom, createRandom, randomMatrix } from './random.js';

const log = createLogger('harness');

/**
 * Settings for {@link runMatrixChecks}.
 */
export interface HarnessOptions {
	/** K values for the exact suite; each builds [[1, -1/K], [-1/K, 1]]. Powers of two keep the products exact. */
	scales: number[];
	/** Consecutive inverse requests per exact-suite matrix */
	repeats: number;
	/** Dimension of the random-suite matrices */
	randomSize: number;
	/** Number of random matrices */
	trials: number;
	/** Consecutive inverse requests per random matrix */
	randomCalls: number;
	/** Passed to the inverse accessor as `{ tolerance }` in the random suite */
	tolerance: number;
	/** Largest per-entry distance from identity accepted in the random suite */
	identityTolerance: number;
	/** Seed of the random-suite generator */
	seed: number;
}

export const DEFAULT_HARNESS_OPTIONS: HarnessOptions = {
	scales: [2, 4, 8, 16],
	repeats: 3,
	randomSize: 6,
	trials: 4,
	randomCalls: 2,
	tolerance: 1e-6,
	identityTolerance: 1e-8,
	seed: 1,
};

export type CheckSuite = 'exact' | 'random';

/** Outcome of one inverse request. */
export interface CheckResult {
	suite: CheckSuite;
	/** `K=2` for the exact suite, `trial 1` for the random suite */
	label: string;
	/** 1-based index of the request against the same matrix */
	call: number;
	size: number;
	/** Largest distance from identity over both products */
	maxDeviation: number;
	/** Whether this result equals the first one obtained for the same matrix */
	consistent: boolean;
	passed: boolean;
}

export interface MatrixCheckReport {
	results: CheckResult[];
	passed: boolean;
}

/**
 * Exercises a caching design through its factory and inverse accessor.
 *
 * The exact suite requires both `inverse × value` and `value × inverse` to equal identity exactly;
 * the random suite requires them to lie within `identityTolerance` of it. In both, every request
 * after the first must return a matrix equal to the first one. Errors thrown by `invert` propagate.
 *
 * @throws MisuseError when the options are out of range
 */
export function runMatrixChecks<M extends CachingMatrix>(
	make: MatrixFactory<M>,
	invert: InverseAccessor<M>,
	options: Partial<HarnessOptions> = {}
): MatrixCheckReport {
	const settings: HarnessOptions = { ...DEFAULT_HARNESS_OPTIONS, ...options };
	validateHarnessOptions(settings);

	const results: CheckResult[] = [];

	for (const scale of settings.scales) {
		log('Exact suite: K=%d', scale);
		const off = -1 / scale;
		const matrix = make([[1, off], [off, 1]]);
		results.push(...checkRepeatedly(matrix, m => invert(m), {
			suite: 'exact',
			label: `K=${scale}`,
			calls: settings.repeats,
			accepts: deviation => deviation === 0,
		}));
	}

	const normal = createNormalRandom(createRandom(settings.seed));
	for (let trial = 1; trial <= settings.trials; trial++) {
		log('Random suite: trial %d (%dx%d)', trial, settings.randomSize, settings.randomSize);
		const matrix = make(randomMatrix(settings.randomSize, normal));
		results.push(...checkRepeatedly(matrix, m => invert(m, { tolerance: settings.tolerance }), {
			suite: 'random',
			label: `trial ${trial}`,
			calls: settings.randomCalls,
			accepts: deviation => deviation <= settings.identityTolerance,
		}));
	}

	const passed = results.every(result => result.passed);
	log('Finished %d checks, %s', results.length, passed ? 'all passed' : 'with failures');
	return { results, passed };
}

/**
 * {@link runMatrixChecks} over a bundled variant.
 */
export function runVariantChecks(variant: MatrixVariant, options?: Partial<HarnessOptions>): MatrixCheckReport {
	return runMatrixChecks(variant.make, variant.invert, options);
}

interface RepeatPlan {
	suite: CheckSuite;
	label: string;
	calls: number;
	accepts: (deviation: number) => boolean;
}

function checkRepeatedly<M extends CachingMatrix>(
	matrix: M,
	invert: (matrix: M) => ReadonlyMatrix,
	plan: RepeatPlan
): CheckResult[] {
	const results: CheckResult[] = [];
	let first: ReadonlyMatrix | undefined;

	for (let call = 1; call <= plan.calls; call++) {
		const inverse = invert(matrix);
		const value = matrix.getValue();
		const unit = identity(value.length);
		const deviation = Math.max(
			maxDeviation(multiply(inverse, value), unit),
			maxDeviation(multiply(value, inverse), unit)
		);
		first ??= inverse;
		const consistent = matricesEqual(inverse, first);
		results.push({
			suite: plan.suite,
			label: plan.label,
			call,
			size: value.length,
			maxDeviation: deviation,
			consistent,
			passed: consistent && plan.accepts(deviation),
		});
	}

	return results;
}

/**
 * @throws MisuseError with code `RANGE` describing the first setting out of range
 */
export function validateHarnessOptions(options: HarnessOptions): void {
	for (const scale of options.scales) {
		if (!isPowerOfTwo(scale) || scale < 2) {
			throw new MisuseError(`Exact-suite scale must be a power of two of at least 2, got ${scale}`, StatusCode.RANGE);
		}
	}
	const counts: [string, number][] = [
		['repeats', options.repeats],
		['randomSize', options.randomSize],
		['trials', options.trials],
		['randomCalls', options.randomCalls],
	];
	for (const [name, count] of counts) {
		if (!Number.isInteger(count) || count < 1) {
			throw new MisuseError(`${name} must be a positive integer, got ${count}`, StatusCode.RANGE);
		}
	}
	if (!Number.isInteger(options.seed)) {
		throw new MisuseError(`seed must be an integer, got ${options.seed}`, StatusCode.RANGE);
	}
	const tolerances: [string, number][] = [
		['tolerance', options.tolerance],
		['identityTolerance', options.identityTolerance],
	];
	for (const [name, value] of tolerances) {
		if (!(value > 0) || !Number.isFinite(value)) {
			throw new MisuseError(`${name} must be a positive number, got ${value}`, StatusCode.RANGE);
		}
	}
}

function isPowerOfTwo(value: number): boolean {
	return Number.isInteger(value) && value > 0 && Number.isInteger(Math.log2(value));
}
