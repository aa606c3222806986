import { columnMatrix, columnVector, Matrix, multiply, transpose } from './Matrix';
import { SingularMatrixError } from './errors';
import { solve } from './LinearSolver';
import { RegressionModel } from './Model';
import { rSquared } from './GoodnessOfFit';
import { checkCoefficients, checkSamples, residuals } from './Residuals';

/**
 * Jacobian of the model at every sample (n rows × m coefficients).
 *
 *   J[i][k] = ∂f(x_i; c) / ∂c_k
 *
 * @public
 */
export function jacobian(model: RegressionModel, x: readonly number[], coefficients: readonly number[]): Matrix {
  const m = model.parameterCount();
  return x.map(xi => {
    const row: number[] = [];
    for (let k = 0; k < m; k++) {
      row.push(model.partialDerivative(xi, k, coefficients));
    }
    return row;
  });
}

/**
 * Runs one Gauss-Newton step and returns the refined coefficients.
 *
 * Solves the normal equations JᵗJ·Δ = Jᵗr and returns c + Δ. The input
 * vector is left untouched. Stopping is up to the caller: run as many steps
 * as needed and compare successive results or {@link rSquared}.
 *
 * @param model - Model to fit
 * @param x - Sample x-coordinates
 * @param y - Sample y-coordinates, one per x
 * @param coefficients - Current guess, `model.parameterCount()` long
 * @returns A new coefficient vector
 * @throws InvalidArgumentError on malformed samples or coefficients
 * @throws SingularMatrixError if the normal equations have no unique solution
 *   or the step overflows
 * @public
 */
export function refine(
  model: RegressionModel,
  x: readonly number[],
  y: readonly number[],
  coefficients: readonly number[]
): number[] {
  checkSamples(x, y);
  checkCoefficients(model, coefficients);

  const J = jacobian(model, x, coefficients);
  const Jt = transpose(J);
  const JtJ = multiply(Jt, J);
  const Jtr = multiply(Jt, columnMatrix(residuals(model, x, y, coefficients)));

  const delta = columnVector(solve(JtJ, Jtr));
  return coefficients.map((value, k) => {
    const next = value + delta[k];
    if (!Number.isFinite(next)) {
      throw new SingularMatrixError(k, `Step for coefficient '${model.parameters[k]}' overflowed`);
    }
    return next;
  });
}

/**
 * Gauss-Newton regression bound to a single model.
 *
 * @example
 * ```ts
 * const regression = new GaussNewtonRegression(exponential);
 * let c = [1, 1];
 * for (let i = 0; i < 20; i++) c = regression.refine(x, y, c);
 * const fit = regression.rSquared(x, y, c);
 * ```
 * @public
 */
export class GaussNewtonRegression {
  constructor(readonly model: RegressionModel) {}

  refine(x: readonly number[], y: readonly number[], coefficients: readonly number[]): number[] {
    return refine(this.model, x, y, coefficients);
  }

  rSquared(x: readonly number[], y: readonly number[], coefficients: readonly number[]): number {
    return rSquared(this.model, x, y, coefficients);
  }

  evaluate(x: number, coefficients: readonly number[]): number {
    checkCoefficients(this.model, coefficients);
    return this.model.evaluate(x, coefficients);
  }
}
