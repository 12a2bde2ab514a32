import { Matrix } from "../matrix";
import { PcaModel } from "./model";

export type ModelRecord = {
  nComponents: number;
  mean: number[];
  eigenvalues: number[];
  /** Row-major `featureCount x featureCount`; column `j` pairs with `eigenvalues[j]`. */
  eigenvectors: number[][];
  explainedVarianceRatio: number;
};

export type ValidationErrorBody = {
  error: string;
};

type RawModelRecord = {
  nComponents?: unknown;
  mean?: unknown;
  eigenvalues?: unknown;
  eigenvectors?: unknown;
  explainedVarianceRatio?: unknown;
};

export function toModelRecord(model: PcaModel): ModelRecord {
  return {
    nComponents: model.nComponents,
    mean: model.mean,
    eigenvalues: model.eigenvalues,
    eigenvectors: model.eigenvectors.toArray(),
    explainedVarianceRatio: model.explainedVarianceRatio,
  };
}

function parseNumericArray(
  fieldName: string,
  value: unknown,
  length: number | null,
): number[] | ValidationErrorBody {
  if (!Array.isArray(value) || value.length === 0) {
    return {
      error: `Invalid model record: '${fieldName}' must be a non-empty array of numbers.`,
    };
  }

  if (length !== null && value.length !== length) {
    return {
      error: `Invalid model record: '${fieldName}' must have length ${length}. Received ${value.length}.`,
    };
  }

  const result = new Array<number>(value.length);

  for (let i = 0; i < value.length; i += 1) {
    const entry: unknown = value[i];

    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      return {
        error: `Invalid model record: '${fieldName}[${i}]' must be a finite number.`,
      };
    }

    result[i] = entry;
  }

  return result;
}

export function parseModelRecord(raw: unknown): ModelRecord | ValidationErrorBody {
  if (raw === null || typeof raw !== "object") {
    return {
      error:
        "Invalid model record: expected an object with 'nComponents', 'mean', 'eigenvalues', 'eigenvectors' and 'explainedVarianceRatio'.",
    };
  }

  const { nComponents, mean, eigenvalues, eigenvectors, explainedVarianceRatio } =
    raw as RawModelRecord;

  const parsedMean = parseNumericArray("mean", mean, null);

  if ("error" in parsedMean) {
    return parsedMean;
  }

  const featureCount = parsedMean.length;

  if (
    typeof nComponents !== "number" ||
    !Number.isInteger(nComponents) ||
    nComponents < 1 ||
    nComponents > featureCount
  ) {
    return {
      error: `Invalid model record: 'nComponents' must be an integer between 1 and ${featureCount}.`,
    };
  }

  const parsedEigenvalues = parseNumericArray(
    "eigenvalues",
    eigenvalues,
    featureCount,
  );

  if ("error" in parsedEigenvalues) {
    return parsedEigenvalues;
  }

  if (!Array.isArray(eigenvectors) || eigenvectors.length !== featureCount) {
    return {
      error: `Invalid model record: 'eigenvectors' must be an array of ${featureCount} rows.`,
    };
  }

  const parsedEigenvectors: number[][] = [];

  for (let i = 0; i < eigenvectors.length; i += 1) {
    const row = parseNumericArray(
      `eigenvectors[${i}]`,
      eigenvectors[i],
      featureCount,
    );

    if ("error" in row) {
      return row;
    }

    parsedEigenvectors.push(row);
  }

  if (
    typeof explainedVarianceRatio !== "number" ||
    Number.isNaN(explainedVarianceRatio)
  ) {
    return {
      error: "Invalid model record: 'explainedVarianceRatio' must be a number.",
    };
  }

  return {
    nComponents,
    mean: parsedMean,
    eigenvalues: parsedEigenvalues,
    eigenvectors: parsedEigenvectors,
    explainedVarianceRatio,
  };
}

/**
 * Rebuilds a model from a validated record. The explained variance ratio is
 * recomputed from the eigenvalues rather than taken from the record.
 */
export function fromModelRecord(record: ModelRecord): PcaModel {
  return new PcaModel({
    nComponents: record.nComponents,
    mean: record.mean,
    eigenvalues: record.eigenvalues,
    eigenvectors: Matrix.fromArray(record.eigenvectors),
  });
}
