import { assertArgument, InvalidArgumentError } from './errors';

/**
 * Function of one real variable with coefficients.
 * @public
 */
export type ModelFunction = (x: number, coefficients: readonly number[]) => number;

/**
 * A parametric curve f(x; c) that the Gauss-Newton engine can fit.
 *
 * Implementations are immutable. `partialDerivative` must be the exact
 * analytic derivative of `evaluate` with respect to coefficient
 * `coefficientIndex`; the engine does not check it.
 * @public
 */
export interface RegressionModel {
  readonly name: string;
  readonly formula: string;
  /** Coefficient names, in coefficient order. */
  readonly parameters: readonly string[];
  /** Known limitation of the model under Gauss-Newton, if any. */
  readonly caveat?: string;

  evaluate(x: number, coefficients: readonly number[]): number;
  partialDerivative(x: number, coefficientIndex: number, coefficients: readonly number[]): number;
  parameterCount(): number;
}

/**
 * Closed-form description of a model, one derivative per coefficient.
 * @public
 */
export interface ModelDefinition {
  name: string;
  formula: string;
  parameters: readonly string[];
  evaluate: ModelFunction;
  derivatives: readonly ModelFunction[];
  caveat?: string;
}

/**
 * Builds a frozen {@link RegressionModel} from a closed-form definition.
 * @throws InvalidArgumentError if the parameter names and derivatives disagree
 * @public
 */
export function defineModel(definition: ModelDefinition): RegressionModel {
  const parameters = Object.freeze([...definition.parameters]);
  const derivatives = Object.freeze([...definition.derivatives]);
  const { evaluate } = definition;

  assertArgument(parameters.length > 0, `Model '${definition.name}' must have at least one coefficient`);
  assertArgument(
    parameters.length === derivatives.length,
    `Model '${definition.name}' names ${parameters.length} coefficients but defines ${derivatives.length} derivatives`
  );

  const model: RegressionModel = {
    name: definition.name,
    formula: definition.formula,
    parameters,
    caveat: definition.caveat,

    evaluate(x, coefficients) {
      return evaluate(x, coefficients);
    },

    partialDerivative(x, coefficientIndex, coefficients) {
      if (!Number.isInteger(coefficientIndex) || coefficientIndex < 0 || coefficientIndex >= derivatives.length) {
        throw new InvalidArgumentError(
          `Coefficient index ${coefficientIndex} is out of range for '${definition.name}' (0..${derivatives.length - 1})`
        );
      }
      return derivatives[coefficientIndex](x, coefficients);
    },

    parameterCount() {
      return derivatives.length;
    },
  };

  return Object.freeze(model);
}
