import { z } from 'zod';
import { DegenerateDataError, RegressionError, SingularMatrixError } from '../../errors';
import { GaussNewtonRegression } from '../../GaussNewton';
import { createModel } from '../../models';
import { assert, CliError, toCliError } from '../cli-error';
import { formatIssues, loadSamples, Samples } from '../samples';

const NOT_A_NUMBER = '--guess must be a comma-separated list of numbers';

const coefficient = z
  .string()
  .min(1, '--guess has an empty entry')
  .transform(Number)
  .pipe(z.number({ invalid_type_error: NOT_A_NUMBER }).finite(NOT_A_NUMBER));

const coefficientList = z
  .string()
  .min(1, '--guess is required')
  .transform(value => value.split(',').map(part => part.trim()))
  .pipe(z.array(coefficient));

export const fitSchema = z.object({
  model: z.string().min(1, '--model is required'),
  data: z.string().min(1, '--data is required'),
  guess: coefficientList,
  base: z.coerce.number().positive('--base must be positive').optional(),
  iterations: z.coerce.number().int().min(1, '--iterations must be at least 1').default(50),
  tolerance: z.coerce.number().nonnegative('--tolerance must not be negative').default(1e-10),
  verbose: z.boolean().optional(),
});

export type FitArgs = z.input<typeof fitSchema>;

export interface FitOptions {
  maxIterations?: number;
  tolerance?: number;
  verbose?: boolean;
}

export type StopReason = 'Step tolerance reached' | 'Max iterations reached';

export interface FitReport {
  model: string;
  formula: string;
  base?: number;
  coefficients: Record<string, number>;
  iterations: number;
  converged: boolean;
  stopReason: StopReason;
  lastStep: number;
  rSquared: number | null;
  samples: number;
}

function formatVector(values: readonly number[]): string {
  return `[${values.map(v => v.toPrecision(8)).join(', ')}]`;
}

/**
 * Repeats single Gauss-Newton steps until the largest coefficient change is
 * at most `tolerance`, or `maxIterations` steps have run.
 */
export function fitSamples(
  regression: GaussNewtonRegression,
  samples: Samples,
  guess: readonly number[],
  options: FitOptions = {}
): Omit<FitReport, 'model' | 'formula' | 'base'> {
  const { maxIterations = 50, tolerance = 1e-10, verbose = false } = options;
  const { model } = regression;

  let coefficients = [...guess];
  let lastStep = Infinity;
  let iterations = 0;
  let converged = false;

  if (verbose) {
    console.log(`Fitting ${model.name}: ${model.formula} to ${samples.x.length} samples`);
    console.log(`  Initial guess: ${formatVector(coefficients)}`);
  }

  while (iterations < maxIterations) {
    let next: number[];
    try {
      next = regression.refine(samples.x, samples.y, coefficients);
    } catch (e) {
      if (e instanceof SingularMatrixError) {
        throw new CliError(
          `Normal equations became singular at iteration ${iterations + 1} (column ${e.column}, coefficient '${model.parameters[e.column]}'). Try a different initial guess.`,
          3
        );
      }
      if (e instanceof RegressionError) {
        throw toCliError(e);
      }
      throw e;
    }

    iterations++;
    lastStep = Math.max(...next.map((value, k) => Math.abs(value - coefficients[k])));
    coefficients = next;

    if (verbose) {
      console.log(`Iteration ${iterations}: coefficients=${formatVector(coefficients)}, max|Δ|=${lastStep.toExponential(2)}`);
    }

    if (!Number.isFinite(lastStep)) {
      throw new CliError(`Fit diverged at iteration ${iterations}: coefficients are no longer finite`, 3);
    }

    if (lastStep <= tolerance) {
      converged = true;
      break;
    }
  }

  let rSquared: number | null;
  try {
    rSquared = regression.rSquared(samples.x, samples.y, coefficients);
  } catch (e) {
    if (!(e instanceof DegenerateDataError)) throw e;
    // Constant y: the fit is still reported, only R² is undefined.
    if (verbose) {
      console.log(`  R² undefined: ${e.message}`);
    }
    rSquared = null;
  }

  const stopReason: StopReason = converged ? 'Step tolerance reached' : 'Max iterations reached';
  if (verbose) {
    console.log(`${stopReason} after ${iterations} iteration(s)${rSquared !== null ? `, R²=${rSquared.toFixed(6)}` : ''}`);
  }

  return {
    coefficients: Object.fromEntries(model.parameters.map((name, k) => [name, coefficients[k]])),
    iterations,
    converged,
    stopReason,
    lastStep,
    rSquared,
    samples: samples.x.length,
  };
}

export function runFit(args: FitArgs): FitReport {
  const parsed = fitSchema.safeParse(args);
  if (!parsed.success) {
    throw new CliError(formatIssues(parsed.error), 2);
  }
  const options = parsed.data;

  let regression: GaussNewtonRegression;
  try {
    regression = new GaussNewtonRegression(createModel(options.model, { base: options.base }));
  } catch (e) {
    if (e instanceof RegressionError) throw toCliError(e);
    throw e;
  }

  const { model } = regression;
  assert(
    options.guess.length === model.parameterCount(),
    `--guess has ${options.guess.length} value(s) but '${model.name}' takes ${model.parameterCount()} (${model.parameters.join(', ')})`,
    2
  );
  if (model.caveat && options.verbose) {
    console.log(`Warning: ${model.caveat}`);
  }

  const samples = loadSamples(options.data);
  const result = fitSamples(regression, samples, options.guess, {
    maxIterations: options.iterations,
    tolerance: options.tolerance,
    verbose: options.verbose,
  });

  return {
    model: model.name,
    formula: model.formula,
    ...(options.base !== undefined ? { base: options.base } : {}),
    ...result,
  };
}

export function formatReport(report: FitReport): string[] {
  const lines = [
    `model: ${report.model}  ${report.formula}${report.base !== undefined ? `  (n = ${report.base})` : ''}`,
  ];
  for (const [name, value] of Object.entries(report.coefficients)) {
    lines.push(`  ${name} = ${value}`);
  }
  lines.push(`iterations: ${report.iterations} (${report.stopReason})`);
  lines.push(`R²: ${report.rSquared === null ? 'undefined (all y values equal)' : report.rSquared}`);
  return lines;
}
