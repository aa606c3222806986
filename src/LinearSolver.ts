import { assertArgument, SingularMatrixError } from './errors';
import { Matrix } from './Matrix';

function assertFinite(matrix: readonly (readonly number[])[], label: string): void {
  matrix.forEach((row, i) => {
    row.forEach((value, j) => {
      assertArgument(Number.isFinite(value), `${label}[${i}][${j}] is not a finite number (${value})`);
    });
  });
}

/**
 * Solves M·C = A by Gaussian elimination followed by back-substitution.
 *
 * Pivots are taken out of order: for each column the first unfinished row
 * with a non-zero entry becomes the pivot, and the column → row mapping is
 * kept so the solution comes back indexed by column.
 *
 * Only an exact zero disqualifies a pivot. A nearly singular system whose
 * elimination leaves rounding residue behind returns an arbitrary finite
 * solution; one whose solution overflows is reported as singular.
 *
 * @param matrix - Square matrix M (d × d)
 * @param answers - Single-column matrix A (d × 1)
 * @returns Single-column matrix C (d × 1)
 * @throws InvalidArgumentError if the shapes are wrong or an entry is not finite
 * @throws SingularMatrixError if some column has no usable pivot or its solution is not finite
 * @public
 */
export function solve(matrix: readonly (readonly number[])[], answers: readonly (readonly number[])[]): Matrix {
  const degree = matrix.length;
  assertArgument(degree > 0, 'Cannot solve an empty system');
  matrix.forEach((row, i) => {
    assertArgument(row.length === degree, `Matrix must be square: row ${i} has ${row.length} columns, expected ${degree}`);
  });
  assertArgument(answers.length === degree, `Answer column has ${answers.length} rows, expected ${degree}`);
  answers.forEach((row, i) => {
    assertArgument(row.length === 1, `Answer column must have exactly one column (row ${i} has ${row.length})`);
  });
  assertFinite(matrix, 'matrix');
  assertFinite(answers, 'answers');

  // Augmented working copy: [ M | A ]
  const work: Matrix = matrix.map((row, i) => [...row, answers[i][0]]);
  const isDone: boolean[] = Array(degree).fill(false);
  const order: number[] = Array(degree).fill(-1);

  // Forward pass: upper-triangular in pivot order, unit diagonal.
  for (let column = 0; column < degree; column++) {
    let activeRow = 0;
    while (activeRow < degree && (isDone[activeRow] || work[activeRow][column] === 0)) {
      activeRow++;
    }

    if (activeRow === degree) {
      throw new SingularMatrixError(column);
    }

    order[column] = activeRow;

    const pivot = work[activeRow][column];
    for (let sub = column; sub <= degree; sub++) {
      work[activeRow][sub] /= pivot;
    }
    isDone[activeRow] = true;

    for (let row = 0; row < degree; row++) {
      if (isDone[row] || work[row][column] === 0) continue;
      const factor = work[row][column];
      for (let sub = column; sub <= degree; sub++) {
        work[row][sub] -= factor * work[activeRow][sub];
      }
    }
  }

  isDone.fill(false);
  const solution: Matrix = Array(degree)
    .fill(0)
    .map(() => [0]);

  // Back-substitution, highest column first.
  for (let column = degree - 1; column >= 0; column--) {
    const activeRow = order[column];
    isDone[activeRow] = true;

    for (let row = 0; row < degree; row++) {
      if (isDone[row]) continue;
      const factor = work[row][column];
      for (let sub = column; sub <= degree; sub++) {
        work[row][sub] -= factor * work[activeRow][sub];
      }
    }

    const value = work[activeRow][degree];
    if (!Number.isFinite(value)) {
      throw new SingularMatrixError(column, `Matrix is numerically singular: solution for column ${column} is not finite`);
    }
    solution[column][0] = value;
  }

  return solution;
}
