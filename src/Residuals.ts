import { assertArgument } from './errors';
import { RegressionModel } from './Model';

/**
 * Checks that x and y describe the same non-empty set of finite samples.
 * @throws InvalidArgumentError
 * @public
 */
export function checkSamples(x: readonly number[], y: readonly number[]): void {
  assertArgument(x.length === y.length, `x and y must have the same length (got ${x.length} and ${y.length})`);
  assertArgument(x.length > 0, 'At least one sample is required');
  for (let i = 0; i < x.length; i++) {
    assertArgument(Number.isFinite(x[i]), `x[${i}] is not a finite number (${x[i]})`);
    assertArgument(Number.isFinite(y[i]), `y[${i}] is not a finite number (${y[i]})`);
  }
}

/**
 * Checks that the coefficient vector fits the model.
 * @throws InvalidArgumentError
 * @public
 */
export function checkCoefficients(model: RegressionModel, coefficients: readonly number[]): void {
  const expected = model.parameterCount();
  assertArgument(
    coefficients.length === expected,
    `Model '${model.name}' takes ${expected} coefficients, got ${coefficients.length}`
  );
  coefficients.forEach((value, i) => {
    assertArgument(Number.isFinite(value), `coefficients[${i}] is not a finite number (${value})`);
  });
}

/**
 * Residual vector r[i] = y_i − f(x_i; c).
 * @throws InvalidArgumentError if the model is not finite at some sample
 * @public
 */
export function residuals(
  model: RegressionModel,
  x: readonly number[],
  y: readonly number[],
  coefficients: readonly number[]
): number[] {
  return x.map((xi, i) => {
    const predicted = model.evaluate(xi, coefficients);
    const residual = y[i] - predicted;
    assertArgument(
      Number.isFinite(residual),
      `Residual at x[${i}] = ${xi} is not finite ('${model.name}' gives ${predicted})`
    );
    return residual;
  });
}
