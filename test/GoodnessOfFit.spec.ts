import { describe, it, expect } from 'vitest';
import { residualSumOfSquares, rSquared, totalSumOfSquares } from '../src/GoodnessOfFit';
import { defineModel } from '../src/Model';
import { powerLaw } from '../src/models';
import { DegenerateDataError, InvalidArgumentError } from '../src/errors';

const line = defineModel({
  name: 'line',
  formula: 'a + b * x',
  parameters: ['a', 'b'],
  evaluate: (x, [a, b]) => a + b * x,
  derivatives: [() => 1, x => x],
});

describe('GoodnessOfFit', () => {
  it('computes the residual sum of squares', () => {
    // residuals [0, 0, -1]
    expect(residualSumOfSquares(line, [0, 1, 2], [1, 3, 4], [1, 2])).toBe(1);
  });

  it('computes the total sum of squares about the mean', () => {
    // mean 3 → (−2)² + 0² + 2²
    expect(totalSumOfSquares([1, 3, 5])).toBe(8);
  });

  it('is 1 for a perfect fit', () => {
    expect(rSquared(line, [0, 1, 2], [1, 3, 5], [1, 2])).toBe(1);
  });

  it('is 1 − RSS/TSS for an imperfect fit', () => {
    // RSS = 1, TSS over [1, 3, 4] = 14/3
    expect(rSquared(line, [0, 1, 2], [1, 3, 4], [1, 2])).toBeCloseTo(1 - 3 / 14, 12);
  });

  it('is 0 when the model predicts the mean', () => {
    expect(rSquared(line, [0, 1, 2], [1, 3, 5], [3, 0])).toBe(0);
  });

  it('goes negative for a fit worse than the mean', () => {
    // residuals [1, 3, 5] → RSS 35, TSS 8
    expect(rSquared(line, [0, 1, 2], [1, 3, 5], [0, 0])).toBeCloseTo(1 - 35 / 8, 12);
  });

  it('throws DegenerateDataError when every y is the same', () => {
    expect(() => rSquared(line, [1, 2, 3], [5, 5, 5], [5, 0])).toThrow(DegenerateDataError);
  });

  it('throws DegenerateDataError for equal y values whose mean rounds', () => {
    expect(() => rSquared(line, [1, 2, 3], [0.1, 0.1, 0.1], [0, 0])).toThrow(DegenerateDataError);
  });

  it('throws DegenerateDataError for a single sample', () => {
    expect(() => rSquared(line, [1], [2], [0, 0])).toThrow(DegenerateDataError);
  });

  it('throws InvalidArgumentError when the model is not finite at a sample', () => {
    // (−1)^1.5 is NaN
    expect(() => rSquared(powerLaw, [-1, 1, 2], [1, 2, 3], [1, 1.5])).toThrow(
      "Residual at x[0] = -1 is not finite ('powerLaw' gives NaN)"
    );
    expect(() => residualSumOfSquares(powerLaw, [-1, 1, 2], [1, 2, 3], [1, 1.5])).toThrow(InvalidArgumentError);
  });

  it('checks its arguments like refine', () => {
    expect(() => rSquared(line, [1, 2], [1], [0, 0])).toThrow(InvalidArgumentError);
    expect(() => rSquared(line, [1, 2], [1, 2], [0])).toThrow(InvalidArgumentError);
  });
});
