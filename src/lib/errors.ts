export type PcaErrorCode =
  | "INVALID_DIMENSIONS"
  | "DIMENSION_MISMATCH"
  | "INVALID_COMPONENT_COUNT"
  | "EIGEN_COMPUTATION_FAILED"
  | "ALLOCATION_FAILURE";

export class PcaError extends Error {
  readonly code: PcaErrorCode;

  constructor(code: PcaErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDimensionsError extends PcaError {
  constructor(message: string) {
    super("INVALID_DIMENSIONS", message);
  }
}

export class DimensionMismatchError extends PcaError {
  constructor(message: string) {
    super("DIMENSION_MISMATCH", message);
  }
}

export class InvalidComponentCountError extends PcaError {
  constructor(message: string) {
    super("INVALID_COMPONENT_COUNT", message);
  }
}

export class EigenComputationFailedError extends PcaError {
  constructor(message: string, options?: ErrorOptions) {
    super("EIGEN_COMPUTATION_FAILED", message, options);
  }
}

export class AllocationFailureError extends PcaError {
  constructor(message: string, options?: ErrorOptions) {
    super("ALLOCATION_FAILURE", message, options);
  }
}

/**
 * Shape and parameter errors are the caller's fault; eigen and allocation
 * failures are not.
 */
export function isClientError(error: unknown): boolean {
  if (!(error instanceof PcaError)) {
    return error instanceof TypeError || error instanceof RangeError;
  }

  return (
    error.code === "INVALID_DIMENSIONS" ||
    error.code === "DIMENSION_MISMATCH" ||
    error.code === "INVALID_COMPONENT_COUNT"
  );
}
