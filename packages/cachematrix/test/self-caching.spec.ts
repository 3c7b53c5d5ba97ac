import { expect } from 'chai';
import {
	SelfCachingMatrix,
	selfCachingSolve,
	selfCachingVariant,
	type SolveOptions,
} from '../src/index.js';
import { createCachingMatrixTests } from './suites/caching-matrix.suite.js';
import { constantSolver, createCountingSolver } from './helpers/counting-solver.js';

createCachingMatrixTests('self-caching', solver => selfCachingVariant(solver));

describe('SelfCachingMatrix', () => {
	it('should default to the empty matrix', () => {
		const matrix = new SelfCachingMatrix();
		expect(matrix.getValue()).to.deep.equal([]);
		expect(matrix.getInverse()).to.deep.equal([]);
	});

	it('should return the same inverse object until the value changes', () => {
		const matrix = new SelfCachingMatrix([[1, -0.5], [-0.5, 1]]);

		const first = matrix.getInverse();
		expect(matrix.getInverse()).to.equal(first);
		expect(selfCachingSolve(matrix)).to.equal(first);

		matrix.setValue([[1, -0.5], [-0.5, 1]]);
		expect(matrix.getInverse()).to.not.equal(first);
	});

	it('should invoke the solver only once across repeated getInverse calls', () => {
		const { solver, calls } = createCountingSolver();
		const matrix = new SelfCachingMatrix([[2, 0], [0, 4]], solver);

		for (let i = 0; i < 5; i++) {
			matrix.getInverse();
		}

		expect(calls).to.have.lengthOf(1);
	});

	it('should report whether an inverse is held', () => {
		const matrix = new SelfCachingMatrix([[2, 0], [0, 4]]);
		expect(matrix.hasCachedInverse).to.equal(false);

		matrix.getInverse();
		expect(matrix.hasCachedInverse).to.equal(true);

		matrix.setValue([[4, 0], [0, 8]]);
		expect(matrix.hasCachedInverse).to.equal(false);
	});

	it('should expose no way to write the cached inverse', () => {
		const matrix = new SelfCachingMatrix([[2, 0], [0, 4]]);
		expect('setCachedInverse' in matrix).to.equal(false);
		expect('setInverse' in matrix).to.equal(false);
	});

	it('should ignore options on a cache hit', () => {
		const { solver, calls } = createCountingSolver();
		const matrix = new SelfCachingMatrix([[2, 0], [0, 4]], solver);
		const first: SolveOptions = { tolerance: 1e-6 };

		matrix.getInverse(first);
		matrix.getInverse({ tolerance: 0.5 });

		expect(calls).to.have.lengthOf(1);
		expect(calls[0].options).to.equal(first);
	});

	it('should hand a ragged value to the solver unchecked', () => {
		const { solver, calls } = createCountingSolver(constantSolver([[1]]));
		const matrix = new SelfCachingMatrix([[1, 2], [3]], solver);

		expect(matrix.getInverse()).to.deep.equal([[1]]);
		expect(calls).to.have.lengthOf(1);
	});

	describe('Ownership', () => {
		it('should copy the value it is given', () => {
			const value = [[2, 0], [0, 4]];
			const matrix = new SelfCachingMatrix(value);

			value[0][0] = 100;

			expect(matrix.getValue()).to.deep.equal([[2, 0], [0, 4]]);
			expect(matrix.getInverse()).to.deep.equal([[0.5, 0], [0, 0.25]]);
		});

		it('should copy values passed to setValue', () => {
			const matrix = new SelfCachingMatrix();
			const value = [[2, 0], [0, 4]];

			matrix.setValue(value);
			value[1][1] = 100;

			expect(matrix.getInverse()).to.deep.equal([[0.5, 0], [0, 0.25]]);
		});

		it('should freeze the value and the inverse it hands out', () => {
			const matrix = new SelfCachingMatrix([[2, 0], [0, 4]]);
			const inverse = matrix.getInverse();

			expect(Object.isFrozen(matrix.getValue())).to.equal(true);
			expect(Object.isFrozen(matrix.getValue()[0])).to.equal(true);
			expect(Object.isFrozen(inverse)).to.equal(true);
			expect(Object.isFrozen(inverse[1])).to.equal(true);
		});

		it('should not be affected by later changes to what the solver returned', () => {
			const answer = [[0.5, 0], [0, 0.25]];
			const matrix = new SelfCachingMatrix([[2, 0], [0, 4]], () => answer);

			matrix.getInverse();
			answer[0][0] = 42;

			expect(matrix.getInverse()).to.deep.equal([[0.5, 0], [0, 0.25]]);
		});
	});

	it('should use the injected solver', () => {
		const matrix = new SelfCachingMatrix([[2, 0], [0, 4]], constantSolver([[1, 2], [3, 4]]));
		expect(matrix.getInverse()).to.deep.equal([[1, 2], [3, 4]]);
	});
});
