import {
  AllocationFailureError,
  DimensionMismatchError,
  InvalidDimensionsError,
} from "../errors";

function assertDimension(value: number, fnName: string, paramName: string) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidDimensionsError(
      `${fnName}: expected '${paramName}' to be a positive integer. Received ${String(
        value,
      )}.`,
    );
  }
}

function allocateRows(rows: number, cols: number, fnName: string) {
  try {
    const data = new Array<Float64Array>(rows);

    for (let i = 0; i < rows; i += 1) {
      data[i] = new Float64Array(cols);
    }

    return data;
  } catch (error) {
    if (error instanceof RangeError) {
      throw new AllocationFailureError(
        `${fnName}: failed to allocate a ${rows}x${cols} matrix.`,
        { cause: error },
      );
    }

    throw error;
  }
}

/**
 * Dense row-major matrix of doubles. The shape is fixed at construction;
 * element values may be changed in place.
 */
export class Matrix {
  readonly rows: number;
  readonly cols: number;
  private readonly data: Float64Array[];

  private constructor(rows: number, cols: number, data: Float64Array[]) {
    this.rows = rows;
    this.cols = cols;
    this.data = data;
  }

  static zeros(rows: number, cols: number): Matrix {
    const fnName = "Matrix.zeros";
    assertDimension(rows, fnName, "rows");
    assertDimension(cols, fnName, "cols");

    return new Matrix(rows, cols, allocateRows(rows, cols, fnName));
  }

  static fromArray(values: readonly (readonly number[])[]): Matrix {
    const fnName = "Matrix.fromArray";

    if (!Array.isArray(values) || values.length === 0) {
      throw new InvalidDimensionsError(
        `${fnName}: expected 'values' to be a non-empty array of rows.`,
      );
    }

    const cols = values[0].length;
    const matrix = Matrix.zeros(values.length, cols);

    for (let i = 0; i < values.length; i += 1) {
      const row = values[i];

      if (row.length !== cols) {
        throw new DimensionMismatchError(
          `${fnName}: all rows must have the same length. Expected ${cols}, but 'values[${i}]' has length ${row.length}.`,
        );
      }

      matrix.data[i].set(row);
    }

    return matrix;
  }

  get(row: number, col: number): number {
    return this.data[row][col];
  }

  set(row: number, col: number, value: number): void {
    this.data[row][col] = value;
  }

  /** Copy of row `i`. */
  row(i: number): number[] {
    return Array.from(this.data[i]);
  }

  /** Copy of column `j`. */
  column(j: number): number[] {
    const result = new Array<number>(this.rows);

    for (let i = 0; i < this.rows; i += 1) {
      result[i] = this.data[i][j];
    }

    return result;
  }

  clone(): Matrix {
    const result = Matrix.zeros(this.rows, this.cols);
    copyInto(result, this);
    return result;
  }

  toArray(): number[][] {
    return this.data.map((row) => Array.from(row));
  }
}

export function createMatrix(rows: number, cols: number): Matrix {
  return Matrix.zeros(rows, cols);
}

export function multiply(a: Matrix, b: Matrix): Matrix {
  if (a.cols !== b.rows) {
    throw new DimensionMismatchError(
      `multiply: cannot multiply ${a.rows}x${a.cols} by ${b.rows}x${b.cols}.`,
    );
  }

  const result = Matrix.zeros(a.rows, b.cols);

  for (let i = 0; i < a.rows; i += 1) {
    for (let j = 0; j < b.cols; j += 1) {
      let sum = 0;

      for (let k = 0; k < a.cols; k += 1) {
        sum += a.get(i, k) * b.get(k, j);
      }

      result.set(i, j, sum);
    }
  }

  return result;
}

export function transpose(a: Matrix): Matrix {
  const result = Matrix.zeros(a.cols, a.rows);

  for (let i = 0; i < a.rows; i += 1) {
    for (let j = 0; j < a.cols; j += 1) {
      result.set(j, i, a.get(i, j));
    }
  }

  return result;
}

export function copyInto(dest: Matrix, src: Matrix): void {
  if (dest.rows !== src.rows || dest.cols !== src.cols) {
    throw new DimensionMismatchError(
      `copyInto: cannot copy a ${src.rows}x${src.cols} matrix into a ${dest.rows}x${dest.cols} matrix.`,
    );
  }

  for (let i = 0; i < src.rows; i += 1) {
    for (let j = 0; j < src.cols; j += 1) {
      dest.set(i, j, src.get(i, j));
    }
  }
}

/** First `k` columns of `a` as a new `a.rows x k` matrix. */
export function sliceColumns(a: Matrix, k: number): Matrix {
  if (!Number.isInteger(k) || k <= 0 || k > a.cols) {
    throw new InvalidDimensionsError(
      `sliceColumns: expected 'k' to be an integer between 1 and ${a.cols}. Received ${String(k)}.`,
    );
  }

  const result = Matrix.zeros(a.rows, k);

  for (let i = 0; i < a.rows; i += 1) {
    for (let j = 0; j < k; j += 1) {
      result.set(i, j, a.get(i, j));
    }
  }

  return result;
}
