import { Matrix as MlMatrix } from 'ml-matrix';
import { DimensionError } from '../common/errors.js';
import type { Matrix, ReadonlyMatrix } from '../common/types.js';

/**
 * Returns `[rows, columns]`, rejecting ragged input.
 */
export function dimensions(matrix: ReadonlyMatrix): [rows: number, columns: number] {
	const rows = matrix.length;
	const columns = rows > 0 ? matrix[0].length : 0;
	for (const row of matrix) {
		if (row.length !== columns) {
			throw new DimensionError(`Matrix rows have inconsistent lengths (${row.length} vs ${columns})`, rows, columns);
		}
	}
	return [rows, columns];
}

export function identity(size: number): Matrix {
	return Array.from({ length: size }, (_, i) =>
		Array.from({ length: size }, (_, j) => (i === j ? 1 : 0))
	);
}

/** Copies into an ml-matrix instance; the source is never aliased. */
export function toMlMatrix(matrix: ReadonlyMatrix): MlMatrix {
	return new MlMatrix(matrix.map(row => [...row]));
}

/**
 * Matrix product `left × right`.
 */
export function multiply(left: ReadonlyMatrix, right: ReadonlyMatrix): Matrix {
	const [leftRows, leftColumns] = dimensions(left);
	const [rightRows, rightColumns] = dimensions(right);
	if (leftColumns !== rightRows) {
		throw new DimensionError(
			`Cannot multiply ${leftRows}x${leftColumns} by ${rightRows}x${rightColumns}`,
			rightRows,
			rightColumns
		);
	}
	if (leftRows === 0 || rightColumns === 0) {
		return Array.from({ length: leftRows }, () => new Array<number>(rightColumns).fill(0));
	}
	return toMlMatrix(left).mmul(toMlMatrix(right)).to2DArray();
}

/**
 * Largest absolute entry-wise difference between two matrices of equal shape.
 */
export function maxDeviation(a: ReadonlyMatrix, b: ReadonlyMatrix): number {
	const [rows, columns] = dimensions(a);
	const [otherRows, otherColumns] = dimensions(b);
	if (rows !== otherRows || columns !== otherColumns) {
		throw new DimensionError(`Shape mismatch: ${rows}x${columns} vs ${otherRows}x${otherColumns}`, otherRows, otherColumns);
	}
	let max = 0;
	for (let i = 0; i < rows; i++) {
		for (let j = 0; j < columns; j++) {
			max = Math.max(max, Math.abs(a[i][j] - b[i][j]));
		}
	}
	return max;
}

/**
 * Exact, entry-by-entry equality. Shapes that differ are simply unequal.
 */
export function matricesEqual(a: ReadonlyMatrix, b: ReadonlyMatrix): boolean {
	if (a.length !== b.length) return false;
	return a.every((row, i) =>
		row.length === b[i].length && row.every((entry, j) => entry === b[i][j])
	);
}

/**
 * Copies a matrix and freezes the copy, rows included.
 */
export function freezeMatrix(matrix: ReadonlyMatrix): ReadonlyMatrix {
	return Object.freeze(matrix.map(row => Object.freeze([...row])));
}
