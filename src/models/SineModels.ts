import { defineModel } from '../Model';

/**
 * Damped sine, f(x) = a·e^(bx)·sin(cx + d).
 *
 * Sensitive to the starting frequency: a guess for c more than a fraction of
 * a period off usually settles on a wrong local minimum.
 * @public
 */
export const dampedSine = defineModel({
  name: 'dampedSine',
  formula: 'a * exp(b * x) * sin(c * x + d)',
  parameters: ['a', 'b', 'c', 'd'],
  evaluate: (x, [a, b, c, d]) => a * Math.exp(b * x) * Math.sin(c * x + d),
  derivatives: [
    (x, [, b, c, d]) => Math.exp(b * x) * Math.sin(c * x + d),
    (x, [a, b, c, d]) => a * x * Math.exp(b * x) * Math.sin(c * x + d),
    (x, [a, b, c, d]) => a * x * Math.exp(b * x) * Math.cos(c * x + d),
    (x, [a, b, c, d]) => a * Math.exp(b * x) * Math.cos(c * x + d),
  ],
});

/**
 * f(x) = a·e^(bx)·(cos(cx) + sin(cx))
 * @public
 */
export const dampedSineFull = defineModel({
  name: 'dampedSineFull',
  formula: 'a * exp(b * x) * (cos(c * x) + sin(c * x))',
  parameters: ['a', 'b', 'c'],
  evaluate: (x, [a, b, c]) => a * Math.exp(b * x) * (Math.cos(c * x) + Math.sin(c * x)),
  derivatives: [
    (x, [, b, c]) => Math.exp(b * x) * (Math.cos(c * x) + Math.sin(c * x)),
    (x, [a, b, c]) => a * x * Math.exp(b * x) * (Math.cos(c * x) + Math.sin(c * x)),
    (x, [a, b, c]) => a * x * Math.exp(b * x) * (Math.cos(c * x) - Math.sin(c * x)),
  ],
});

/**
 * f(x) = a·e^(bx)·(cos(cx + d) + sin(cx + d))
 * @public
 */
export const dampedSineFullPhase = defineModel({
  name: 'dampedSineFullPhase',
  formula: 'a * exp(b * x) * (cos(c * x + d) + sin(c * x + d))',
  parameters: ['a', 'b', 'c', 'd'],
  evaluate: (x, [a, b, c, d]) => a * Math.exp(b * x) * (Math.cos(c * x + d) + Math.sin(c * x + d)),
  derivatives: [
    (x, [, b, c, d]) => Math.exp(b * x) * (Math.cos(c * x + d) + Math.sin(c * x + d)),
    (x, [a, b, c, d]) => a * x * Math.exp(b * x) * (Math.cos(c * x + d) + Math.sin(c * x + d)),
    (x, [a, b, c, d]) => a * x * Math.exp(b * x) * (Math.cos(c * x + d) - Math.sin(c * x + d)),
    (x, [a, b, c, d]) => a * Math.exp(b * x) * (Math.cos(c * x + d) - Math.sin(c * x + d)),
  ],
});
