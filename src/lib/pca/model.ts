import {
  DimensionMismatchError,
  InvalidComponentCountError,
} from "../errors";
import { Matrix, multiply, sliceColumns, transpose } from "../matrix";
import {
  computeEigen,
  sortEigen,
  DEFAULT_MAX_ITERATIONS,
  type EigenDecomposition,
  type PowerIterationOptions,
} from "./eigen";
import { NORMALIZE_EPSILON } from "../vectors";
import { decomposeSymmetric } from "./evd";
import { centerData, computeCovariance, computeMean } from "./statistics";

export type EigenSolver = "power-iteration" | "symmetric-evd";

export const EIGEN_SOLVERS: readonly EigenSolver[] = [
  "power-iteration",
  "symmetric-evd",
];

export type FitOptions = PowerIterationOptions & {
  solver?: EigenSolver;
  onProgress?: (message: string) => void;
  onWarning?: (message: string) => void;
};

type PcaModelState = {
  nComponents: number;
  mean: readonly number[];
  eigenvalues: readonly number[];
  eigenvectors: Matrix;
};

export function assertComponentCount(
  nComponents: number,
  featureCount: number,
  fnName: string,
): void {
  if (!Number.isInteger(nComponents) || nComponents < 1) {
    throw new InvalidComponentCountError(
      `${fnName}: expected 'nComponents' to be a positive integer. Received ${String(
        nComponents,
      )}.`,
    );
  }

  if (nComponents > featureCount) {
    throw new InvalidComponentCountError(
      `${fnName}: 'nComponents' (${nComponents}) cannot be greater than the number of features (${featureCount}).`,
    );
  }
}

/**
 * Share of the total variance held by the first `nComponents` eigenvalues
 * (which must already be sorted). Defined as 0 when the total variance is
 * at most `NORMALIZE_EPSILON` per eigenvalue: constant data leaves only
 * rounding noise after centring.
 */
export function explainedVarianceRatio(
  eigenvalues: readonly number[],
  nComponents: number,
): number {
  let total = 0;
  let explained = 0;

  for (let i = 0; i < eigenvalues.length; i += 1) {
    total += eigenvalues[i];

    if (i < nComponents) {
      explained += eigenvalues[i];
    }
  }

  if (total <= NORMALIZE_EPSILON * eigenvalues.length) {
    return 0;
  }

  return explained / total;
}

/**
 * A fitted PCA projection. Holds every eigenpair of the training
 * covariance, sorted by eigenvalue descending, of which the first
 * `nComponents` are used by `transform`.
 *
 * Accessors return copies; the model's buffers are never shared.
 */
export class PcaModel {
  readonly nComponents: number;
  readonly explainedVarianceRatio: number;
  private readonly state: PcaModelState;

  constructor(state: PcaModelState) {
    const featureCount = state.mean.length;

    if (
      state.eigenvalues.length !== featureCount ||
      state.eigenvectors.rows !== featureCount ||
      state.eigenvectors.cols !== featureCount
    ) {
      throw new DimensionMismatchError(
        `PcaModel: expected ${featureCount} eigenvalues and a ${featureCount}x${featureCount} eigenvector matrix. Received ${state.eigenvalues.length} and ${state.eigenvectors.rows}x${state.eigenvectors.cols}.`,
      );
    }

    assertComponentCount(state.nComponents, featureCount, "PcaModel");

    this.state = {
      nComponents: state.nComponents,
      mean: state.mean.slice(),
      eigenvalues: state.eigenvalues.slice(),
      eigenvectors: state.eigenvectors.clone(),
    };
    this.nComponents = state.nComponents;
    this.explainedVarianceRatio = explainedVarianceRatio(
      state.eigenvalues,
      state.nComponents,
    );
  }

  get featureCount(): number {
    return this.state.mean.length;
  }

  get mean(): number[] {
    return this.state.mean.slice();
  }

  get eigenvalues(): number[] {
    return this.state.eigenvalues.slice();
  }

  /** `featureCount x featureCount`; column `j` pairs with `eigenvalues[j]`. */
  get eigenvectors(): Matrix {
    return this.state.eigenvectors.clone();
  }

  /** The first `nComponents` eigenvector columns. */
  get components(): Matrix {
    return sliceColumns(this.state.eigenvectors, this.nComponents);
  }

  /** Same fit, different number of retained components. */
  withComponents(nComponents: number): PcaModel {
    return new PcaModel({ ...this.state, nComponents });
  }
}

/** `centered · V[:, 0..k)` */
export function projectData(
  centered: Matrix,
  eigenvectors: Matrix,
  k: number,
): Matrix {
  return multiply(centered, sliceColumns(eigenvectors, k));
}

function decompose(
  covariance: Matrix,
  options: FitOptions,
): EigenDecomposition {
  const solver = options.solver ?? "power-iteration";

  if (solver === "symmetric-evd") {
    return decomposeSymmetric(covariance);
  }

  const decomposition = computeEigen(covariance, options);
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  decomposition.converged.forEach((converged, index) => {
    if (!converged) {
      options.onWarning?.(
        `Eigenpair ${index + 1} did not converge within ${maxIterations} iterations; using the last estimate.`,
      );
    }
  });

  return decomposition;
}

/**
 * Fits a PCA model on `data`.
 *
 * `data` is centred in place: after this call it holds the centred values,
 * not the caller's original ones. Pass a copy (or reload the data) if the
 * original is needed for a later `transform`.
 */
export function fit(
  data: Matrix,
  nComponents: number,
  options: FitOptions = {},
): PcaModel {
  assertComponentCount(nComponents, data.cols, "fit");

  const report = options.onProgress;

  const mean = computeMean(data);

  report?.("Centering data (subtracting mean)...");
  centerData(data, mean);

  report?.("Computing covariance matrix...");
  const covariance = computeCovariance(data);

  report?.("Computing eigenvalues and eigenvectors...");
  const { eigenvalues, eigenvectors } = decompose(covariance, options);

  report?.("Sorting by eigenvalues (descending)...");
  sortEigen(eigenvalues, eigenvectors);

  return new PcaModel({ nComponents, mean, eigenvalues, eigenvectors });
}

/**
 * Projects `data` onto the model's components, returning a new
 * `data.rows x nComponents` matrix.
 *
 * Like `fit`, this centres `data` in place using the model's mean.
 */
export function transform(model: PcaModel, data: Matrix): Matrix {
  if (data.cols !== model.featureCount) {
    throw new DimensionMismatchError(
      `transform: the model was fitted on ${model.featureCount} features but the data has ${data.cols} columns.`,
    );
  }

  centerData(data, model.mean);

  return projectData(data, model.eigenvectors, model.nComponents);
}

/**
 * Maps projected rows back to feature space: `projected · V_kᵀ + mean`.
 * With `nComponents` equal to the feature count this recovers the data
 * passed to `transform`, up to the accuracy of the eigenvectors.
 */
export function inverseTransform(model: PcaModel, projected: Matrix): Matrix {
  if (projected.cols !== model.nComponents) {
    throw new DimensionMismatchError(
      `inverseTransform: expected ${model.nComponents} columns (one per component). Received ${projected.cols}.`,
    );
  }

  const reconstructed = multiply(projected, transpose(model.components));
  const mean = model.mean;

  for (let i = 0; i < reconstructed.rows; i += 1) {
    for (let j = 0; j < reconstructed.cols; j += 1) {
      reconstructed.set(i, j, reconstructed.get(i, j) + mean[j]);
    }
  }

  return reconstructed;
}
