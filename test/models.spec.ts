import { describe, it, expect } from 'vitest';
import { defineModel, RegressionModel } from '../src/Model';
import {
  createModel,
  dampedSine,
  dampedSineFull,
  dampedSineFullPhase,
  exponential,
  exponentialDecay,
  exponentialDecayOffset,
  exponentialDecayShifted,
  exponentialOffset,
  exponentialShifted,
  fixedBase,
  fixedBaseOffset,
  listModels,
  modelNames,
  power,
  powerLaw,
  powerLawOffset,
  powerScaled,
  powerShifted,
  powerShiftedOffset,
} from '../src/models';
import { InvalidArgumentError } from '../src/errors';
import { numericalPartials } from './testUtils';

interface DerivativeCase {
  model: RegressionModel;
  coefficients: number[];
  xs: number[];
}

const positiveXs = [0.5, 1, 2.5, 4];
const anyXs = [-1.5, 0, 0.7, 2];

const cases: DerivativeCase[] = [
  { model: exponential, coefficients: [1.3, 0.4], xs: anyXs },
  { model: exponentialOffset, coefficients: [1.3, 0.4, -2], xs: anyXs },
  { model: exponentialShifted, coefficients: [0.8, -0.3, 0.5, 1], xs: anyXs },
  { model: exponentialDecay, coefficients: [5, -0.8], xs: anyXs },
  { model: exponentialDecayOffset, coefficients: [5, -0.8, 2], xs: anyXs },
  { model: exponentialDecayShifted, coefficients: [5, -0.8, 0.2, 2], xs: anyXs },
  { model: powerLaw, coefficients: [3, 1.5], xs: positiveXs },
  { model: powerLaw, coefficients: [2, -0.7], xs: positiveXs },
  { model: powerLawOffset, coefficients: [3, 1.5, -2], xs: positiveXs },
  { model: fixedBase(2), coefficients: [1.5, 0.7], xs: anyXs },
  { model: fixedBase(10), coefficients: [0.5, -0.2], xs: anyXs },
  { model: fixedBaseOffset(3), coefficients: [1.5, 0.7, 4], xs: anyXs },
  { model: power, coefficients: [2, 1.3], xs: anyXs },
  { model: powerScaled, coefficients: [2, 1.3, 0.6], xs: anyXs },
  { model: powerShifted, coefficients: [2, 1.3, 0.6, -0.4], xs: anyXs },
  { model: powerShiftedOffset, coefficients: [2, 1.3, 0.6, -0.4, 1.1], xs: anyXs },
  { model: dampedSine, coefficients: [2, -0.3, 1.5, 0.4], xs: anyXs },
  { model: dampedSineFull, coefficients: [2, -0.3, 1.5], xs: anyXs },
  { model: dampedSineFullPhase, coefficients: [2, -0.3, 1.5, 0.4], xs: anyXs },
];

describe('model catalog', () => {
  describe('analytic derivatives match central differences', () => {
    for (const { model, coefficients, xs } of cases) {
      it(`${model.name} at [${coefficients.join(', ')}]`, () => {
        expect(model.parameterCount()).toBe(coefficients.length);
        for (const x of xs) {
          const numeric = numericalPartials(model, x, coefficients);
          for (let k = 0; k < coefficients.length; k++) {
            const analytic = model.partialDerivative(x, k, coefficients);
            const tolerance = 1e-6 * Math.max(1, Math.abs(analytic));
            expect(Math.abs(analytic - numeric[k])).toBeLessThan(tolerance);
          }
        }
      });
    }
  });

  it('evaluates the documented formulas', () => {
    expect(exponential.evaluate(2, [3, 0.5])).toBeCloseTo(3 * Math.E, 12);
    expect(exponentialDecay.evaluate(1, [4, -1])).toBeCloseTo(4 * (1 - Math.exp(-1)), 12);
    expect(powerLaw.evaluate(4, [2, 0.5])).toBe(4);
    expect(fixedBase(2).evaluate(3, [1.5, 1])).toBe(12);
    expect(power.evaluate(3, [2, 3])).toBe(54);
    expect(dampedSine.evaluate(0, [2, -0.3, 1.5, Math.PI / 2])).toBe(2);
  });

  it('rejects coefficient indices outside the model', () => {
    expect(() => exponential.partialDerivative(1, 2, [1, 1])).toThrow(InvalidArgumentError);
    expect(() => exponential.partialDerivative(1, -1, [1, 1])).toThrow(InvalidArgumentError);
    expect(() => exponential.partialDerivative(1, 0.5, [1, 1])).toThrow(InvalidArgumentError);
    expect(() => exponential.partialDerivative(1, 2, [1, 1])).toThrow(
      "Coefficient index 2 is out of range for 'exponential' (0..1)"
    );
  });

  it('models are frozen', () => {
    expect(Object.isFrozen(exponential)).toBe(true);
    expect(Object.isFrozen(exponential.parameters)).toBe(true);
  });

  it('flags the forms that do not converge', () => {
    const flagged = listModels()
      .filter(m => m.caveat !== undefined)
      .map(m => m.name);
    expect(flagged).toEqual([
      'exponentialShifted',
      'exponentialDecayShifted',
      'powerScaled',
      'powerShifted',
      'powerShiftedOffset',
    ]);
  });

  describe('fixedBase', () => {
    it('keeps its base fixed per instance', () => {
      const two = fixedBase(2);
      const three = fixedBase(3);
      expect(two.evaluate(1, [1, 1])).toBe(2);
      expect(three.evaluate(1, [1, 1])).toBe(3);
    });

    it('rejects a base that is not positive', () => {
      expect(() => fixedBase(0)).toThrow(InvalidArgumentError);
      expect(() => fixedBaseOffset(-2)).toThrow(InvalidArgumentError);
      expect(() => fixedBase(NaN)).toThrow(InvalidArgumentError);
    });
  });

  describe('createModel', () => {
    it('resolves every catalog name', () => {
      for (const name of modelNames()) {
        const model = createModel(name, { base: 2 });
        expect(model.name).toBe(name);
      }
      expect(modelNames()).toHaveLength(17);
    });

    it('passes the base through to fixed-base models', () => {
      expect(createModel('fixedBase', { base: 10 }).evaluate(2, [1, 1])).toBeCloseTo(100, 10);
    });

    it('requires a base for fixed-base models', () => {
      expect(() => createModel('fixedBaseOffset')).toThrow('This model needs a fixed base (base option)');
    });

    it('rejects unknown names', () => {
      expect(() => createModel('quadratic')).toThrow(InvalidArgumentError);
    });
  });

  describe('defineModel', () => {
    it('requires one derivative per coefficient name', () => {
      expect(() =>
        defineModel({
          name: 'broken',
          formula: 'a * x',
          parameters: ['a', 'b'],
          evaluate: (x, [a]) => a * x,
          derivatives: [x => x],
        })
      ).toThrow(InvalidArgumentError);
    });

    it('requires at least one coefficient', () => {
      expect(() =>
        defineModel({ name: 'empty', formula: '0', parameters: [], evaluate: () => 0, derivatives: [] })
      ).toThrow(InvalidArgumentError);
    });
  });
});
