import { assertArgument } from './errors';

/**
 * Dense matrix stored row-major: `matrix[row][column]`.
 * @public
 */
export type Matrix = number[][];

function columnCount(matrix: readonly (readonly number[])[], label: string): number {
  assertArgument(matrix.length > 0, `${label} has no rows`);
  const columns = matrix[0].length;
  for (let row = 1; row < matrix.length; row++) {
    assertArgument(
      matrix[row].length === columns,
      `${label} is ragged: row ${row} has ${matrix[row].length} columns, expected ${columns}`
    );
  }
  return columns;
}

/**
 * Returns the transpose of a matrix.
 * @param matrix - Any non-empty rectangular matrix
 * @returns Matrix with rows and columns swapped
 * @public
 */
export function transpose(matrix: readonly (readonly number[])[]): Matrix {
  const columns = columnCount(matrix, 'Matrix');
  const result: Matrix = Array(columns)
    .fill(0)
    .map(() => Array(matrix.length).fill(0));

  for (let row = 0; row < matrix.length; row++) {
    for (let column = 0; column < columns; column++) {
      result[column][row] = matrix[row][column];
    }
  }

  return result;
}

/**
 * Multiplies two matrices, [A][B].
 * @param a - Left operand (n × k)
 * @param b - Right operand (k × m)
 * @returns Product matrix (n × m)
 * @throws InvalidArgumentError if the columns of `a` do not match the rows of `b`
 * @public
 */
export function multiply(a: readonly (readonly number[])[], b: readonly (readonly number[])[]): Matrix {
  const inner = columnCount(a, 'Left operand');
  const columns = columnCount(b, 'Right operand');
  assertArgument(
    inner === b.length,
    `Cannot multiply ${a.length}×${inner} by ${b.length}×${columns}: inner dimensions differ`
  );

  const result: Matrix = [];
  for (let row = 0; row < a.length; row++) {
    const resultRow: number[] = [];
    for (let column = 0; column < columns; column++) {
      let sum = 0;
      for (let k = 0; k < inner; k++) {
        sum += a[row][k] * b[k][column];
      }
      resultRow.push(sum);
    }
    result.push(resultRow);
  }

  return result;
}

/**
 * Wraps a vector as an n × 1 matrix.
 * @public
 */
export function columnMatrix(vector: readonly number[]): Matrix {
  return vector.map(value => [value]);
}

/**
 * Reads an n × 1 matrix back into a vector.
 * @public
 */
export function columnVector(matrix: readonly (readonly number[])[]): number[] {
  const columns = columnCount(matrix, 'Column matrix');
  assertArgument(columns === 1, `Expected a single-column matrix, got ${columns} columns`);
  return matrix.map(row => row[0]);
}
