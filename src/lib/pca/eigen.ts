import {
  AllocationFailureError,
  DimensionMismatchError,
  EigenComputationFailedError,
} from "../errors";
import { Matrix } from "../matrix";
import { dotProduct, normalize } from "../vectors";

export const DEFAULT_MAX_ITERATIONS = 1000;
export const DEFAULT_TOLERANCE = 1e-10;

export type PowerIterationOptions = {
  maxIterations?: number;
  tolerance?: number;
};

export type EigenDecomposition = {
  /** `eigenvalues[j]` belongs to column `j` of `eigenvectors`. */
  eigenvalues: number[];
  eigenvectors: Matrix;
  /** Power iterations spent on each eigenpair, in discovery order. */
  iterations: number[];
  /** Whether each eigenpair met the tolerance before `maxIterations`. */
  converged: boolean[];
};

function assertSquare(matrix: Matrix, fnName: string) {
  if (matrix.rows !== matrix.cols) {
    throw new DimensionMismatchError(
      `${fnName}: expected a square matrix. Received ${matrix.rows}x${matrix.cols}.`,
    );
  }
}

function resolveOptions(options: PowerIterationOptions) {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;

  if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
    throw new RangeError(
      `computeEigen: expected 'maxIterations' to be a positive integer. Received ${String(
        maxIterations,
      )}.`,
    );
  }

  if (!Number.isFinite(tolerance) || tolerance <= 0) {
    throw new RangeError(
      `computeEigen: expected 'tolerance' to be a positive finite number. Received ${String(
        tolerance,
      )}.`,
    );
  }

  return { maxIterations, tolerance };
}

function allocateWorkspace(symmetric: Matrix) {
  const n = symmetric.rows;

  try {
    return {
      deflated: symmetric.clone(),
      eigenvectors: Matrix.zeros(n, n),
      eigenvalues: new Array<number>(n).fill(0),
    };
  } catch (error) {
    if (error instanceof AllocationFailureError || error instanceof RangeError) {
      throw new EigenComputationFailedError(
        `computeEigen: failed to allocate working buffers for a ${n}x${n} matrix.`,
        { cause: error },
      );
    }

    throw error;
  }
}

function multiplyVector(matrix: Matrix, vector: readonly number[]): number[] {
  const result = new Array<number>(matrix.rows).fill(0);

  for (let i = 0; i < matrix.rows; i += 1) {
    let sum = 0;

    for (let j = 0; j < matrix.cols; j += 1) {
      sum += matrix.get(i, j) * vector[j];
    }

    result[i] = sum;
  }

  return result;
}

/** A ← A − λ·v·vᵀ */
function deflate(matrix: Matrix, eigenvalue: number, eigenvector: readonly number[]) {
  for (let i = 0; i < matrix.rows; i += 1) {
    for (let j = 0; j < matrix.cols; j += 1) {
      matrix.set(
        i,
        j,
        matrix.get(i, j) - eigenvalue * eigenvector[i] * eigenvector[j],
      );
    }
  }
}

/**
 * All eigenpairs of a symmetric matrix by power iteration with deflation.
 *
 * Every pair starts from the constant vector `1/√n`, so results are
 * reproducible. Pairs come out in discovery order, which is usually but not
 * always descending; run `sortEigen` on the result. Running out of
 * iterations is not an error: the last estimate is kept and the pair is
 * flagged in `converged`.
 *
 * Near-repeated eigenvalues converge slowly and lose orthogonality after
 * deflation, and an eigenvector orthogonal to the seed is never found (its
 * eigenvalue comes out as 0). Use the `symmetric-evd` solver where that
 * matters.
 */
export function computeEigen(
  symmetric: Matrix,
  options: PowerIterationOptions = {},
): EigenDecomposition {
  assertSquare(symmetric, "computeEigen");

  const { maxIterations, tolerance } = resolveOptions(options);
  const n = symmetric.rows;
  const { deflated, eigenvectors, eigenvalues } = allocateWorkspace(symmetric);
  const iterations: number[] = [];
  const converged: boolean[] = [];
  const seed = 1 / Math.sqrt(n);

  for (let k = 0; k < n; k += 1) {
    let vector = new Array<number>(n).fill(seed);
    let eigenvalue = 0;
    let spent = 0;
    let done = false;

    for (let iteration = 0; iteration < maxIterations; iteration += 1) {
      spent = iteration + 1;

      const product = multiplyVector(deflated, vector);
      // Rayleigh quotient against the previous (unit) iterate.
      const candidate = dotProduct(product, vector);
      const next = normalize(product);

      const delta = Math.abs(candidate - eigenvalue);
      eigenvalue = candidate;
      vector = next;

      if (delta < tolerance) {
        done = true;
        break;
      }
    }

    eigenvalues[k] = eigenvalue;

    for (let i = 0; i < n; i += 1) {
      eigenvectors.set(i, k, vector[i]);
    }

    iterations.push(spent);
    converged.push(done);

    deflate(deflated, eigenvalue, vector);
  }

  return { eigenvalues, eigenvectors, iterations, converged };
}

/**
 * Reorders eigenvalues descending in place, moving eigenvector columns with
 * them. Order among equal eigenvalues is unspecified.
 */
export function sortEigen(eigenvalues: number[], eigenvectors: Matrix): void {
  const n = eigenvalues.length;

  if (eigenvectors.cols !== n) {
    throw new DimensionMismatchError(
      `sortEigen: ${n} eigenvalues but ${eigenvectors.cols} eigenvector columns.`,
    );
  }

  for (let i = 0; i < n - 1; i += 1) {
    for (let j = 0; j < n - i - 1; j += 1) {
      if (eigenvalues[j] < eigenvalues[j + 1]) {
        const value = eigenvalues[j];
        eigenvalues[j] = eigenvalues[j + 1];
        eigenvalues[j + 1] = value;

        for (let row = 0; row < eigenvectors.rows; row += 1) {
          const entry = eigenvectors.get(row, j);
          eigenvectors.set(row, j, eigenvectors.get(row, j + 1));
          eigenvectors.set(row, j + 1, entry);
        }
      }
    }
  }
}
