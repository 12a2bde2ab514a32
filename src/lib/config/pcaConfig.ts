import { DEFAULT_MAX_ITERATIONS, DEFAULT_TOLERANCE } from "../pca/eigen";
import { EIGEN_SOLVERS, type EigenSolver } from "../pca/model";

const INPUT_FILE_ENV = "PCA_INPUT_FILE" as const;
const OUTPUT_FILE_ENV = "PCA_OUTPUT_FILE" as const;
const N_COMPONENTS_ENV = "N_COMPONENTS" as const;
const MAX_ITERATIONS_ENV = "PCA_MAX_ITERATIONS" as const;
const TOLERANCE_ENV = "PCA_TOLERANCE" as const;
const SOLVER_ENV = "PCA_SOLVER" as const;
const TIMESTAMP_ENV = "TIMESTAMP" as const;
const PORT_ENV = "PORT" as const;

export const DEFAULT_INPUT_FILE = "data/input_data.csv";
export const DEFAULT_OUTPUT_FILE = "data/output_data.csv";
export const DEFAULT_COMPONENTS = 2;
export const DEFAULT_PORT = 4000;

function readEnv(name: string): string | null {
  const raw = process.env[name];

  if (!raw || raw.trim().length === 0) {
    return null;
  }

  return raw.trim();
}

function readPositiveInteger(name: string, fallback: number): number {
  const raw = readEnv(name);

  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export function getInputFile(): string {
  return readEnv(INPUT_FILE_ENV) ?? DEFAULT_INPUT_FILE;
}

export function getOutputFile(): string {
  return readEnv(OUTPUT_FILE_ENV) ?? DEFAULT_OUTPUT_FILE;
}

export function getComponentCount(): number {
  return readPositiveInteger(N_COMPONENTS_ENV, DEFAULT_COMPONENTS);
}

export function getMaxIterations(): number {
  return readPositiveInteger(MAX_ITERATIONS_ENV, DEFAULT_MAX_ITERATIONS);
}

export function getTolerance(): number {
  const raw = readEnv(TOLERANCE_ENV);

  if (!raw) {
    return DEFAULT_TOLERANCE;
  }

  const parsed = Number(raw);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_TOLERANCE;
  }

  return parsed;
}

export function isEigenSolver(value: unknown): value is EigenSolver {
  return EIGEN_SOLVERS.some((solver) => solver === value);
}

export function getSolver(): EigenSolver {
  const raw = readEnv(SOLVER_ENV);

  return isEigenSolver(raw) ? raw : "power-iteration";
}

export function getTimestamp(): string | null {
  return readEnv(TIMESTAMP_ENV);
}

export function getPort(): number {
  return readPositiveInteger(PORT_ENV, DEFAULT_PORT);
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");

  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `data/out.csv` + `20251018_093000` → `data/out_20251018_093000.csv` */
export function buildTimestampedPath(path: string, timestamp: string): string {
  const slash = path.lastIndexOf("/");
  const dot = path.lastIndexOf(".");

  if (dot <= slash + 1) {
    return `${path}_${timestamp}`;
  }

  return `${path.slice(0, dot)}_${timestamp}${path.slice(dot)}`;
}

export function getConfigEnvVarNames(): readonly string[] {
  return [
    INPUT_FILE_ENV,
    OUTPUT_FILE_ENV,
    N_COMPONENTS_ENV,
    MAX_ITERATIONS_ENV,
    TOLERANCE_ENV,
    SOLVER_ENV,
    TIMESTAMP_ENV,
    PORT_ENV,
  ];
}
