import { PCA } from "ml-pca";

import { DimensionMismatchError, EigenComputationFailedError } from "../errors";
import { Matrix } from "../matrix";
import type { EigenDecomposition } from "./eigen";

/**
 * Symmetric eigendecomposition of a covariance matrix, delegated to
 * ml-pca's covariance mode (ml-matrix `EigenvalueDecomposition` underneath).
 *
 * Returns the same shape as `computeEigen` so `fit` can use either solver.
 * Every pair is exact up to rounding, so all are reported as converged
 * after a single pass.
 */
export function decomposeSymmetric(covariance: Matrix): EigenDecomposition {
  const fnName = "decomposeSymmetric";

  if (covariance.rows !== covariance.cols) {
    throw new DimensionMismatchError(
      `${fnName}: expected a square matrix. Received ${covariance.rows}x${covariance.cols}.`,
    );
  }

  const n = covariance.rows;
  let pca: PCA;

  try {
    pca = new PCA(covariance.toArray(), { isCovarianceMatrix: true });
  } catch (error) {
    throw new EigenComputationFailedError(
      `${fnName}: eigendecomposition of a ${n}x${n} matrix failed.`,
      { cause: error },
    );
  }

  const eigenvalues = pca.getEigenvalues().slice(0, n);
  const vectors = pca.getEigenvectors();

  if (eigenvalues.length !== n || vectors.rows !== n || vectors.columns !== n) {
    throw new EigenComputationFailedError(
      `${fnName}: expected ${n} eigenpairs, received ${eigenvalues.length} eigenvalues and a ${vectors.rows}x${vectors.columns} eigenvector matrix.`,
    );
  }

  const eigenvectors = Matrix.zeros(n, n);

  for (let i = 0; i < n; i += 1) {
    for (let j = 0; j < n; j += 1) {
      eigenvectors.set(i, j, vectors.get(i, j));
    }
  }

  return {
    eigenvalues,
    eigenvectors,
    iterations: new Array<number>(n).fill(1),
    converged: new Array<boolean>(n).fill(true),
  };
}
