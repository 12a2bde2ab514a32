import { describe, expect, it } from "vitest";

import { DimensionMismatchError } from "../errors";
import { Matrix, createMatrix } from "../matrix";
import { computeEigen, sortEigen } from "./eigen";

// Eigenvalues 3 + √3, 3 and 3 - √3.
function tridiagonal() {
  return Matrix.fromArray([
    [4, 1, 0],
    [1, 3, 1],
    [0, 1, 2],
  ]);
}

function residual(matrix: Matrix, eigenvalue: number, vector: number[]) {
  let worst = 0;

  for (let i = 0; i < matrix.rows; i += 1) {
    let sum = 0;

    for (let j = 0; j < matrix.cols; j += 1) {
      sum += matrix.get(i, j) * vector[j];
    }

    worst = Math.max(worst, Math.abs(sum - eigenvalue * vector[i]));
  }

  return worst;
}

function dot(a: number[], b: number[]) {
  return a.reduce((sum, value, index) => sum + value * b[index], 0);
}

describe("computeEigen", () => {
  it("finds every eigenpair of a symmetric positive definite matrix", () => {
    const matrix = tridiagonal();
    const { eigenvalues, eigenvectors, converged } = computeEigen(matrix);
    sortEigen(eigenvalues, eigenvectors);

    expect(converged).toEqual([true, true, true]);
    expect(eigenvalues[0]).toBeCloseTo(3 + Math.sqrt(3), 5);
    expect(eigenvalues[1]).toBeCloseTo(3, 5);
    expect(eigenvalues[2]).toBeCloseTo(3 - Math.sqrt(3), 5);

    for (let k = 0; k < 3; k += 1) {
      expect(residual(matrix, eigenvalues[k], eigenvectors.column(k))).toBeLessThan(
        1e-3,
      );
    }
  });

  it("keeps eigenvalues non-negative and their sum equal to the trace", () => {
    const { eigenvalues } = computeEigen(tridiagonal());

    for (const value of eigenvalues) {
      expect(value).toBeGreaterThan(-1e-9);
    }

    const sum = eigenvalues.reduce((total, value) => total + value, 0);
    expect(sum).toBeCloseTo(9, 6);
  });

  it("returns unit-length, pairwise orthogonal eigenvectors for distinct eigenvalues", () => {
    const { eigenvectors } = computeEigen(tridiagonal());
    const columns = [0, 1, 2].map((k) => eigenvectors.column(k));

    for (let i = 0; i < 3; i += 1) {
      expect(Math.sqrt(dot(columns[i], columns[i]))).toBeCloseTo(1, 10);

      for (let j = i + 1; j < 3; j += 1) {
        expect(Math.abs(dot(columns[i], columns[j]))).toBeLessThan(1e-3);
      }
    }
  });

  it("recovers the axes of a diagonal matrix", () => {
    const matrix = Matrix.fromArray([
      [5, 0, 0],
      [0, 2, 0],
      [0, 0, 1],
    ]);

    const { eigenvalues, eigenvectors } = computeEigen(matrix);
    sortEigen(eigenvalues, eigenvectors);

    expect(eigenvalues[0]).toBeCloseTo(5, 6);
    expect(eigenvalues[1]).toBeCloseTo(2, 6);
    expect(eigenvalues[2]).toBeCloseTo(1, 6);
    expect(Math.abs(eigenvectors.get(0, 0))).toBeCloseTo(1, 6);
    expect(Math.abs(eigenvectors.get(1, 1))).toBeCloseTo(1, 6);
    expect(Math.abs(eigenvectors.get(2, 2))).toBeCloseTo(1, 6);
  });

  it("is deterministic across runs", () => {
    const first = computeEigen(tridiagonal());
    const second = computeEigen(tridiagonal());

    expect(second.eigenvalues).toEqual(first.eigenvalues);
    expect(second.eigenvectors.toArray()).toEqual(first.eigenvectors.toArray());
  });

  it("does not modify the input matrix", () => {
    const matrix = tridiagonal();

    computeEigen(matrix);

    expect(matrix.toArray()).toEqual(tridiagonal().toArray());
  });

  it("keeps the last estimate when the iteration budget runs out", () => {
    const { iterations, converged, eigenvalues } = computeEigen(tridiagonal(), {
      maxIterations: 1,
    });

    expect(iterations).toEqual([1, 1, 1]);
    expect(converged[0]).toBe(false);
    // One step from the uniform seed gives the mean of all entries.
    expect(eigenvalues[0]).toBeCloseTo(13 / 3, 12);
  });

  it("returns zero eigenpairs for a zero matrix", () => {
    const { eigenvalues, eigenvectors, converged, iterations } = computeEigen(
      createMatrix(2, 2),
    );

    expect(eigenvalues).toEqual([0, 0]);
    expect(eigenvectors.toArray()).toEqual([
      [0, 0],
      [0, 0],
    ]);
    expect(converged).toEqual([true, true]);
    expect(iterations).toEqual([1, 1]);
  });

  it("misses an eigenvector orthogonal to the uniform seed", () => {
    // Eigenpairs (3, [1, 1]/√2) and (1, [1, -1]/√2); the seed is the first.
    const { eigenvalues, converged } = computeEigen(
      Matrix.fromArray([
        [2, 1],
        [1, 2],
      ]),
    );

    expect(converged).toEqual([true, true]);
    expect(eigenvalues[0]).toBeCloseTo(3, 10);
    expect(eigenvalues[1]).toBeCloseTo(0, 10);
  });

  it("rejects non-square input", () => {
    expect(() => computeEigen(createMatrix(2, 3))).toThrow(
      DimensionMismatchError,
    );
  });

  it("rejects invalid iteration settings", () => {
    expect(() => computeEigen(tridiagonal(), { maxIterations: 0 })).toThrow(
      RangeError,
    );
    expect(() => computeEigen(tridiagonal(), { tolerance: -1 })).toThrow(
      RangeError,
    );
  });
});

describe("sortEigen", () => {
  it("orders eigenvalues descending and moves their columns with them", () => {
    const eigenvalues = [1, 3, 2];
    const eigenvectors = Matrix.fromArray([
      [1, 3, 2],
      [10, 30, 20],
    ]);

    sortEigen(eigenvalues, eigenvectors);

    expect(eigenvalues).toEqual([3, 2, 1]);
    expect(eigenvectors.toArray()).toEqual([
      [3, 2, 1],
      [30, 20, 10],
    ]);
  });

  it("leaves sorted input as it is", () => {
    const eigenvalues = [4, 4, 1];
    const eigenvectors = Matrix.fromArray([[4, 4, 1]]);

    sortEigen(eigenvalues, eigenvectors);

    expect(eigenvalues).toEqual([4, 4, 1]);
    expect(eigenvectors.toArray()).toEqual([[4, 4, 1]]);
  });

  it("rejects a column count that does not match the eigenvalues", () => {
    expect(() => sortEigen([1, 2], createMatrix(2, 3))).toThrow(
      "sortEigen: 2 eigenvalues but 3 eigenvector columns.",
    );
  });
});
