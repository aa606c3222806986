import { defineModel } from '../Model';

const SHIFT_CAVEAT =
  'a and c only enter as a·e^c, so the normal equations are near singular and Gauss-Newton does not converge on this form.';
const DECAY_SHIFT_CAVEAT =
  'a and d both act as constant offsets and c only scales a, so the normal equations are near singular and Gauss-Newton does not converge on this form.';

/**
 * f(x) = a·e^(bx)
 * @public
 */
export const exponential = defineModel({
  name: 'exponential',
  formula: 'a * exp(b * x)',
  parameters: ['a', 'b'],
  evaluate: (x, [a, b]) => a * Math.exp(b * x),
  derivatives: [
    (x, [, b]) => Math.exp(b * x),
    (x, [a, b]) => a * x * Math.exp(b * x),
  ],
});

/**
 * f(x) = a·e^(bx) + c
 * @public
 */
export const exponentialOffset = defineModel({
  name: 'exponentialOffset',
  formula: 'a * exp(b * x) + c',
  parameters: ['a', 'b', 'c'],
  evaluate: (x, [a, b, c]) => a * Math.exp(b * x) + c,
  derivatives: [
    (x, [, b]) => Math.exp(b * x),
    (x, [a, b]) => a * x * Math.exp(b * x),
    () => 1,
  ],
});

/**
 * f(x) = a·e^(bx + c) + d
 * @public
 */
export const exponentialShifted = defineModel({
  name: 'exponentialShifted',
  formula: 'a * exp(b * x + c) + d',
  parameters: ['a', 'b', 'c', 'd'],
  caveat: SHIFT_CAVEAT,
  evaluate: (x, [a, b, c, d]) => a * Math.exp(b * x + c) + d,
  derivatives: [
    (x, [, b, c]) => Math.exp(b * x + c),
    (x, [a, b, c]) => a * x * Math.exp(b * x + c),
    (x, [a, b, c]) => a * Math.exp(b * x + c),
    () => 1,
  ],
});

/**
 * f(x) = a·(1 − e^(bx)), saturating growth for b < 0.
 * @public
 */
export const exponentialDecay = defineModel({
  name: 'exponentialDecay',
  formula: 'a * (1 - exp(b * x))',
  parameters: ['a', 'b'],
  evaluate: (x, [a, b]) => a * (1 - Math.exp(b * x)),
  derivatives: [
    (x, [, b]) => 1 - Math.exp(b * x),
    (x, [a, b]) => -a * x * Math.exp(b * x),
  ],
});

/**
 * f(x) = a·(1 − e^(bx)) + c
 * @public
 */
export const exponentialDecayOffset = defineModel({
  name: 'exponentialDecayOffset',
  formula: 'a * (1 - exp(b * x)) + c',
  parameters: ['a', 'b', 'c'],
  evaluate: (x, [a, b, c]) => a * (1 - Math.exp(b * x)) + c,
  derivatives: [
    (x, [, b]) => 1 - Math.exp(b * x),
    (x, [a, b]) => -a * x * Math.exp(b * x),
    () => 1,
  ],
});

/**
 * f(x) = a·(1 − e^(bx + c)) + d
 * @public
 */
export const exponentialDecayShifted = defineModel({
  name: 'exponentialDecayShifted',
  formula: 'a * (1 - exp(b * x + c)) + d',
  parameters: ['a', 'b', 'c', 'd'],
  caveat: DECAY_SHIFT_CAVEAT,
  evaluate: (x, [a, b, c, d]) => a * (1 - Math.exp(b * x + c)) + d,
  derivatives: [
    (x, [, b, c]) => 1 - Math.exp(b * x + c),
    (x, [a, b, c]) => -a * x * Math.exp(b * x + c),
    (x, [a, b, c]) => -a * Math.exp(b * x + c),
    () => 1,
  ],
});
