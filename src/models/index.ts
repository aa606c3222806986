import { assertArgument, InvalidArgumentError } from '../errors';
import { RegressionModel } from '../Model';
import {
  exponential,
  exponentialDecay,
  exponentialDecayOffset,
  exponentialDecayShifted,
  exponentialOffset,
  exponentialShifted,
} from './ExponentialModels';
import {
  fixedBase,
  fixedBaseOffset,
  power,
  powerLaw,
  powerLawOffset,
  powerScaled,
  powerShifted,
  powerShiftedOffset,
} from './PowerModels';
import { dampedSine, dampedSineFull, dampedSineFullPhase } from './SineModels';

export * from './ExponentialModels';
export * from './PowerModels';
export * from './SineModels';

/**
 * Construction options for catalog models that carry a fixed constant.
 * @public
 */
export interface ModelOptions {
  base?: number;
}

interface CatalogEntry {
  readonly requiresBase: boolean;
  create(options: ModelOptions): RegressionModel;
}

const fixed = (model: RegressionModel): CatalogEntry => ({ requiresBase: false, create: () => model });

const withBase = (factory: (base: number) => RegressionModel): CatalogEntry => ({
  requiresBase: true,
  create: ({ base }) => {
    assertArgument(base !== undefined, 'This model needs a fixed base (base option)');
    return factory(base);
  },
});

const catalog: ReadonlyMap<string, CatalogEntry> = new Map([
  ['exponential', fixed(exponential)],
  ['exponentialOffset', fixed(exponentialOffset)],
  ['exponentialShifted', fixed(exponentialShifted)],
  ['exponentialDecay', fixed(exponentialDecay)],
  ['exponentialDecayOffset', fixed(exponentialDecayOffset)],
  ['exponentialDecayShifted', fixed(exponentialDecayShifted)],
  ['powerLaw', fixed(powerLaw)],
  ['powerLawOffset', fixed(powerLawOffset)],
  ['fixedBase', withBase(fixedBase)],
  ['fixedBaseOffset', withBase(fixedBaseOffset)],
  ['power', fixed(power)],
  ['powerScaled', fixed(powerScaled)],
  ['powerShifted', fixed(powerShifted)],
  ['powerShiftedOffset', fixed(powerShiftedOffset)],
  ['dampedSine', fixed(dampedSine)],
  ['dampedSineFull', fixed(dampedSineFull)],
  ['dampedSineFullPhase', fixed(dampedSineFullPhase)],
]);

/**
 * Names of every model in the catalog.
 * @public
 */
export function modelNames(): string[] {
  return [...catalog.keys()];
}

/**
 * Resolves a catalog model by name.
 * @throws InvalidArgumentError for an unknown name, or a missing/invalid base
 * @public
 */
export function createModel(name: string, options: ModelOptions = {}): RegressionModel {
  const entry = catalog.get(name);
  if (!entry) {
    throw new InvalidArgumentError(`Unknown model '${name}'. Known models: ${modelNames().join(', ')}`);
  }
  return entry.create(options);
}

/**
 * Describes one catalog entry.
 * @public
 */
export interface ModelDescription {
  name: string;
  formula: string;
  parameters: readonly string[];
  requiresBase: boolean;
  caveat?: string;
}

/**
 * Describes the catalog.
 * @public
 */
export function listModels(): ModelDescription[] {
  return [...catalog.entries()].map(([name, entry]) => {
    const model = entry.create({ base: Math.E });
    return {
      name,
      formula: model.formula,
      parameters: model.parameters,
      requiresBase: entry.requiresBase,
      caveat: model.caveat,
    };
  });
}
