export {
  assertArgument,
  DegenerateDataError,
  InvalidArgumentError,
  RegressionError,
  SingularMatrixError,
  type RegressionErrorCode,
} from './errors';
export { columnMatrix, columnVector, multiply, transpose, type Matrix } from './Matrix';
export { solve } from './LinearSolver';
export { defineModel, type ModelDefinition, type ModelFunction, type RegressionModel } from './Model';
export { checkCoefficients, checkSamples, residuals } from './Residuals';
export { GaussNewtonRegression, jacobian, refine } from './GaussNewton';
export { residualSumOfSquares, rSquared, totalSumOfSquares } from './GoodnessOfFit';

// Model catalog
export * from './models';
