export type { EigenDecomposition, PowerIterationOptions } from "./eigen";
export {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOLERANCE,
  computeEigen,
  sortEigen,
} from "./eigen";
export { decomposeSymmetric } from "./evd";

export type { EigenSolver, FitOptions } from "./model";
export {
  EIGEN_SOLVERS,
  PcaModel,
  explainedVarianceRatio,
  fit,
  inverseTransform,
  projectData,
  transform,
} from "./model";

export type { ModelRecord, ValidationErrorBody } from "./serialization";
export { fromModelRecord, parseModelRecord, toModelRecord } from "./serialization";

export { centerData, computeCovariance, computeMean } from "./statistics";
