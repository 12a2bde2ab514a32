import type { Vector } from "../vectors";

export type ValidationErrorBody = {
  error: string;
};

export function validateNumericVectorEntries(
  pathPrefix: string,
  vector: unknown[],
): Vector | ValidationErrorBody {
  const numeric = new Array<number>(vector.length);

  for (let j = 0; j < vector.length; j += 1) {
    const value = vector[j];

    if (typeof value !== "number" || !Number.isFinite(value)) {
      return {
        error:
          "Invalid request body: '" +
          pathPrefix +
          "[" +
          j +
          "]' must be a finite number.",
      };
    }

    numeric[j] = value;
  }

  return numeric;
}

/**
 * Validates a rectangular, non-empty array of finite numbers.
 */
export function parseNumericRows(
  fieldName: string,
  rawRows: unknown,
): { rows: number[][]; dimension: number } | ValidationErrorBody {
  if (!Array.isArray(rawRows)) {
    return {
      error: `Invalid request body: '${fieldName}' must be a non-empty array of numeric vectors.`,
    };
  }

  if (rawRows.length === 0) {
    return {
      error: `Invalid request body: '${fieldName}' array must contain at least one vector.`,
    };
  }

  const rows: number[][] = [];
  let dimension: number | null = null;

  for (let i = 0; i < rawRows.length; i += 1) {
    const row: unknown = rawRows[i];

    if (!Array.isArray(row)) {
      return {
        error: `Invalid request body: '${fieldName}[${i}]' must be an array of numbers.`,
      };
    }

    if (row.length === 0) {
      return {
        error: `Invalid request body: '${fieldName}[${i}]' must not be empty.`,
      };
    }

    if (dimension === null) {
      dimension = row.length;
    } else if (row.length !== dimension) {
      return {
        error: `Invalid request body: all '${fieldName}' entries must have the same length (input dimension).`,
      };
    }

    const numericRow = validateNumericVectorEntries(`${fieldName}[${i}]`, row);

    if ("error" in numericRow) {
      return numericRow;
    }

    rows.push(numericRow);
  }

  return { rows, dimension: dimension ?? 0 };
}
