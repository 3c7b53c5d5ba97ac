/**
 * Parametrized test suite for caching matrix designs
 *
 * Both designs must honor the same contract when driven through their variant:
 * lazy computation, one computation per value epoch, invalidation on setValue,
 * option pass-through and error propagation.
 */

import { expect } from 'chai';
import {
	SingularMatrixError,
	createNormalRandom,
	createRandom,
	identity,
	maxDeviation,
	multiply,
	randomMatrix,
	runMatrixChecks,
	type CachingMatrix,
	type MatrixVariant,
	type SolveOptions,
	type Solver,
} from '../../src/index.js';
import { createCountingSolver, type CountingSolver } from '../helpers/counting-solver.js';

/**
 * Binds a caching design to the solver the tests hand it
 */
export type VariantFactory<M extends CachingMatrix> = (solver: Solver) => MatrixVariant<M>;

/**
 * Create the caching matrix test suite for a specific design
 *
 * @param name Name of the design (e.g., "externally-cached")
 * @param factory Builds the variant around a solver
 */
export function createCachingMatrixTests<M extends CachingMatrix>(name: string, factory: VariantFactory<M>): void {
	describe(`CachingMatrix [${name}]`, () => {
		let counting: CountingSolver;
		let variant: MatrixVariant<M>;

		beforeEach(() => {
			counting = createCountingSolver();
			variant = factory(counting.solver);
		});

		describe('Values', () => {
			it('should return the value it was made from', () => {
				const matrix = variant.make([[2, 0], [0, 4]]);
				expect(matrix.getValue()).to.deep.equal([[2, 0], [0, 4]]);
			});

			it('should invert the empty matrix to the empty matrix', () => {
				const matrix = variant.make([]);
				expect(variant.invert(matrix)).to.deep.equal([]);
			});

			it('should replace the value on setValue', () => {
				const matrix = variant.make([[2, 0], [0, 4]]);
				matrix.setValue([[4, 0], [0, 8]]);
				expect(matrix.getValue()).to.deep.equal([[4, 0], [0, 8]]);
			});
		});

		describe('Inversion', () => {
			it('should invert [[1, -0.5], [-0.5, 1]] with exact identity products', () => {
				const value = [[1, -0.5], [-0.5, 1]];
				const matrix = variant.make(value);
				const inverse = variant.invert(matrix);

				expect(inverse[0][0]).to.be.closeTo(4 / 3, 1e-15);
				expect(inverse[0][1]).to.be.closeTo(2 / 3, 1e-15);
				expect(inverse[1][0]).to.be.closeTo(2 / 3, 1e-15);
				expect(inverse[1][1]).to.be.closeTo(4 / 3, 1e-15);
				expect(multiply(value, inverse)).to.deep.equal([[1, 0], [0, 1]]);
				expect(multiply(inverse, value)).to.deep.equal([[1, 0], [0, 1]]);
			});

			it('should keep a random 6x6 inverse within 1e-8 of identity', () => {
				const value = randomMatrix(6, createNormalRandom(createRandom(7)));
				const matrix = variant.make(value);
				const options: SolveOptions = { tolerance: 1e-6 };

				const first = variant.invert(matrix, options);
				const second = variant.invert(matrix, options);

				expect(maxDeviation(multiply(value, first), identity(6))).to.be.at.most(1e-8);
				expect(maxDeviation(multiply(second, value), identity(6))).to.be.at.most(1e-8);
				expect(counting.calls).to.have.lengthOf(1);
			});

			it('should pass the check harness', () => {
				const report = runMatrixChecks(variant.make, variant.invert);
				expect(report.passed).to.equal(true);
				expect(report.results).to.have.lengthOf(20);
			});
		});

		describe('Caching', () => {
			it('should not compute before the inverse is requested', () => {
				variant.make([[2, 0], [0, 4]]);
				expect(counting.calls).to.have.lengthOf(0);
			});

			it('should compute the inverse once per value epoch', () => {
				const matrix = variant.make([[1, -0.25], [-0.25, 1]]);

				const first = variant.invert(matrix);
				const second = variant.invert(matrix);
				const third = variant.invert(matrix);

				expect(counting.calls).to.have.lengthOf(1);
				expect(second).to.deep.equal(first);
				expect(third).to.deep.equal(first);
			});

			it('should recompute against the new value after setValue', () => {
				const matrix = variant.make([[2, 0], [0, 4]]);
				expect(variant.invert(matrix)).to.deep.equal([[0.5, 0], [0, 0.25]]);

				matrix.setValue([[4, 0], [0, 8]]);
				const inverse = variant.invert(matrix);

				expect(inverse).to.deep.equal([[0.25, 0], [0, 0.125]]);
				expect(multiply(matrix.getValue(), inverse)).to.deep.equal([[1, 0], [0, 1]]);
				expect(counting.calls).to.have.lengthOf(2);
				expect(counting.calls[1].value).to.deep.equal([[4, 0], [0, 8]]);
			});

			it('should recompute after setValue even when the new value equals the old one', () => {
				const matrix = variant.make([[2, 0], [0, 4]]);
				variant.invert(matrix);
				matrix.setValue([[2, 0], [0, 4]]);
				variant.invert(matrix);
				expect(counting.calls).to.have.lengthOf(2);
			});
		});

		describe('Options', () => {
			it('should hand the options object to the solver unchanged', () => {
				const matrix = variant.make([[2, 0], [0, 4]]);
				const options: SolveOptions = { tolerance: 1e-6 };

				variant.invert(matrix, options);

				expect(counting.calls).to.have.lengthOf(1);
				expect(counting.calls[0].options).to.equal(options);
			});

			it('should call the solver without options when none are given', () => {
				const matrix = variant.make([[2, 0], [0, 4]]);
				variant.invert(matrix);
				expect(counting.calls[0].options).to.equal(undefined);
			});
		});

		describe('Errors', () => {
			it('should propagate a singular matrix error and cache nothing', () => {
				const matrix = variant.make([[1, 2], [2, 4]]);

				expect(() => variant.invert(matrix)).to.throw(SingularMatrixError);
				expect(() => variant.invert(matrix)).to.throw(SingularMatrixError);
				expect(counting.calls).to.have.lengthOf(2);
			});

			it('should recover once a singular value is replaced', () => {
				const matrix = variant.make([[1, 2], [2, 4]]);
				expect(() => variant.invert(matrix)).to.throw(SingularMatrixError);

				matrix.setValue([[2, 0], [0, 4]]);
				expect(variant.invert(matrix)).to.deep.equal([[0.5, 0], [0, 0.25]]);
			});
		});
	});
}
