import { assertArgument } from '../errors';
import { defineModel, RegressionModel } from '../Model';

const BASE_EXPONENT_CAVEAT =
  'The base and the exponent scale trade off against each other, so Gauss-Newton does not converge on this form.';

/**
 * f(x) = a·x^b. Needs x > 0; a negative b gives a / x^|b|.
 * @public
 */
export const powerLaw = defineModel({
  name: 'powerLaw',
  formula: 'a * x^b',
  parameters: ['a', 'b'],
  evaluate: (x, [a, b]) => a * Math.pow(x, b),
  derivatives: [
    (x, [, b]) => Math.pow(x, b),
    (x, [a, b]) => a * Math.pow(x, b) * Math.log(x),
  ],
});

/**
 * f(x) = a·x^b + c
 * @public
 */
export const powerLawOffset = defineModel({
  name: 'powerLawOffset',
  formula: 'a * x^b + c',
  parameters: ['a', 'b', 'c'],
  evaluate: (x, [a, b, c]) => a * Math.pow(x, b) + c,
  derivatives: [
    (x, [, b]) => Math.pow(x, b),
    (x, [a, b]) => a * Math.pow(x, b) * Math.log(x),
    () => 1,
  ],
});

function checkBase(base: number): void {
  assertArgument(Number.isFinite(base) && base > 0, `Fixed base must be a positive finite number, got ${base}`);
}

/**
 * f(x) = a·n^(bx) for a base n fixed when the model is created.
 * @param base - The fixed base n (> 0)
 * @public
 */
export function fixedBase(base: number): RegressionModel {
  checkBase(base);
  const lnBase = Math.log(base);
  return defineModel({
    name: 'fixedBase',
    formula: 'a * n^(b * x)',
    parameters: ['a', 'b'],
    evaluate: (x, [a, b]) => a * Math.pow(base, b * x),
    derivatives: [
      (x, [, b]) => Math.pow(base, b * x),
      (x, [a, b]) => a * x * Math.pow(base, b * x) * lnBase,
    ],
  });
}

/**
 * f(x) = a·n^(bx) + c for a fixed base n.
 * @public
 */
export function fixedBaseOffset(base: number): RegressionModel {
  checkBase(base);
  const lnBase = Math.log(base);
  return defineModel({
    name: 'fixedBaseOffset',
    formula: 'a * n^(b * x) + c',
    parameters: ['a', 'b', 'c'],
    evaluate: (x, [a, b, c]) => a * Math.pow(base, b * x) + c,
    derivatives: [
      (x, [, b]) => Math.pow(base, b * x),
      (x, [a, b]) => a * x * Math.pow(base, b * x) * lnBase,
      () => 1,
    ],
  });
}

/**
 * f(x) = a·b^x with b > 0.
 * @public
 */
export const power = defineModel({
  name: 'power',
  formula: 'a * b^x',
  parameters: ['a', 'b'],
  evaluate: (x, [a, b]) => a * Math.pow(b, x),
  derivatives: [
    (x, [, b]) => Math.pow(b, x),
    (x, [a, b]) => a * x * Math.pow(b, x - 1),
  ],
});

/**
 * f(x) = a·b^(cx)
 * @public
 */
export const powerScaled = defineModel({
  name: 'powerScaled',
  formula: 'a * b^(c * x)',
  parameters: ['a', 'b', 'c'],
  caveat: BASE_EXPONENT_CAVEAT,
  evaluate: (x, [a, b, c]) => a * Math.pow(b, c * x),
  derivatives: [
    (x, [, b, c]) => Math.pow(b, c * x),
    (x, [a, b, c]) => a * c * x * Math.pow(b, c * x - 1),
    (x, [a, b, c]) => a * x * Math.pow(b, c * x) * Math.log(b),
  ],
});

/**
 * f(x) = a·b^(cx + d)
 * @public
 */
export const powerShifted = defineModel({
  name: 'powerShifted',
  formula: 'a * b^(c * x + d)',
  parameters: ['a', 'b', 'c', 'd'],
  caveat: BASE_EXPONENT_CAVEAT,
  evaluate: (x, [a, b, c, d]) => a * Math.pow(b, c * x + d),
  derivatives: [
    (x, [, b, c, d]) => Math.pow(b, c * x + d),
    (x, [a, b, c, d]) => a * (c * x + d) * Math.pow(b, c * x + d - 1),
    (x, [a, b, c, d]) => a * x * Math.pow(b, c * x + d) * Math.log(b),
    (x, [a, b, c, d]) => a * Math.pow(b, c * x + d) * Math.log(b),
  ],
});

/**
 * f(x) = a·b^(cx + d) + g
 * @public
 */
export const powerShiftedOffset = defineModel({
  name: 'powerShiftedOffset',
  formula: 'a * b^(c * x + d) + g',
  parameters: ['a', 'b', 'c', 'd', 'g'],
  caveat: BASE_EXPONENT_CAVEAT,
  evaluate: (x, [a, b, c, d, g]) => a * Math.pow(b, c * x + d) + g,
  derivatives: [
    (x, [, b, c, d]) => Math.pow(b, c * x + d),
    (x, [a, b, c, d]) => a * (c * x + d) * Math.pow(b, c * x + d - 1),
    (x, [a, b, c, d]) => a * x * Math.pow(b, c * x + d) * Math.log(b),
    (x, [a, b, c, d]) => a * Math.pow(b, c * x + d) * Math.log(b),
    () => 1,
  ],
});
