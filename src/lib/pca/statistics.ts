import { DimensionMismatchError } from "../errors";
import { Matrix, multiply, transpose } from "../matrix";

export function computeMean(matrix: Matrix): number[] {
  const mean = new Array<number>(matrix.cols).fill(0);

  for (let j = 0; j < matrix.cols; j += 1) {
    for (let i = 0; i < matrix.rows; i += 1) {
      mean[j] += matrix.get(i, j);
    }

    mean[j] /= matrix.rows;
  }

  return mean;
}

/**
 * Subtracts `mean[j]` from every entry of column `j`. Mutates `matrix`.
 */
export function centerData(matrix: Matrix, mean: readonly number[]): void {
  if (mean.length !== matrix.cols) {
    throw new DimensionMismatchError(
      `centerData: mean has length ${mean.length} but the matrix has ${matrix.cols} columns.`,
    );
  }

  for (let i = 0; i < matrix.rows; i += 1) {
    for (let j = 0; j < matrix.cols; j += 1) {
      matrix.set(i, j, matrix.get(i, j) - mean[j]);
    }
  }
}

/**
 * Sample covariance `(Xᵀ·X) / (rows - 1)` of an already centred matrix.
 * A single-row matrix is divided by 1.
 */
export function computeCovariance(centered: Matrix): Matrix {
  const covariance = multiply(transpose(centered), centered);
  const divisor = Math.max(centered.rows - 1, 1);

  for (let i = 0; i < covariance.rows; i += 1) {
    for (let j = 0; j < covariance.cols; j += 1) {
      covariance.set(i, j, covariance.get(i, j) / divisor);
    }
  }

  return covariance;
}
