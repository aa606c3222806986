import { DegenerateDataError } from './errors';
import { RegressionModel } from './Model';
import { checkCoefficients, checkSamples, residuals } from './Residuals';

/**
 * Sum of squared residuals, Σ(y_i − f(x_i; c))².
 * @public
 */
export function residualSumOfSquares(
  model: RegressionModel,
  x: readonly number[],
  y: readonly number[],
  coefficients: readonly number[]
): number {
  checkSamples(x, y);
  checkCoefficients(model, coefficients);
  return residuals(model, x, y, coefficients).reduce((sum, r) => sum + r * r, 0);
}

/**
 * Sum of squared deviations from the mean, Σ(y_i − ȳ)².
 * @public
 */
export function totalSumOfSquares(y: readonly number[]): number {
  if (!y.length) return 0;
  const mean = y.reduce((sum, v) => sum + v, 0) / y.length;
  return y.reduce((sum, v) => sum + (v - mean) * (v - mean), 0);
}

/**
 * Coefficient of determination, 1 − RSS/TSS.
 *
 * Usually within [0, 1]; negative when the model does worse than the mean
 * of y, which is a legitimate result.
 *
 * @throws InvalidArgumentError on malformed samples or coefficients
 * @throws DegenerateDataError if every y value is the same (TSS = 0)
 * @public
 */
export function rSquared(
  model: RegressionModel,
  x: readonly number[],
  y: readonly number[],
  coefficients: readonly number[]
): number {
  const rss = residualSumOfSquares(model, x, y, coefficients);
  const tss = totalSumOfSquares(y);
  // Mean of equal values can round away from them, so compare directly too.
  if (tss === 0 || y.every(v => v === y[0])) {
    throw new DegenerateDataError();
  }
  return 1 - rss / tss;
}
