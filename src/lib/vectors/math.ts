import { DimensionMismatchError, InvalidDimensionsError } from "../errors";

export type Vector = number[];

/** Norms at or below this are treated as zero by `normalize`. */
export const NORMALIZE_EPSILON = 1e-10;

function assertVector(vector: readonly number[], fnName: string, paramName: string) {
  if (!Array.isArray(vector)) {
    throw new TypeError(
      `${fnName}: expected '${paramName}' to be an array of numbers.`,
    );
  }

  if (vector.length === 0) {
    throw new InvalidDimensionsError(
      `${fnName}: expected '${paramName}' to contain at least one element.`,
    );
  }
}

function assertSameLengthVectors(
  a: readonly number[],
  b: readonly number[],
  fnName: string,
) {
  assertVector(a, fnName, "a");
  assertVector(b, fnName, "b");

  if (a.length !== b.length) {
    throw new DimensionMismatchError(
      `${fnName}: vectors 'a' and 'b' must have the same length. Received ${a.length} and ${b.length}.`,
    );
  }
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  const fnName = "dotProduct";
  assertSameLengthVectors(a, b, fnName);

  let sum = 0;

  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }

  return sum;
}

export function norm(vector: readonly number[]): number {
  assertVector(vector, "norm", "vector");

  let sumSq = 0;

  for (let i = 0; i < vector.length; i += 1) {
    const value = vector[i];
    sumSq += value * value;
  }

  return Math.sqrt(sumSq);
}

/**
 * Unit-length copy of `vector`. A vector whose norm is at or below
 * `NORMALIZE_EPSILON` is returned unscaled.
 */
export function normalize(vector: readonly number[]): Vector {
  const magnitude = norm(vector);
  const result = new Array<number>(vector.length);

  if (magnitude <= NORMALIZE_EPSILON) {
    for (let i = 0; i < vector.length; i += 1) {
      result[i] = vector[i];
    }

    return result;
  }

  for (let i = 0; i < vector.length; i += 1) {
    result[i] = vector[i] / magnitude;
  }

  return result;
}
