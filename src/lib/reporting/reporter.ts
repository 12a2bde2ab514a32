import type { Matrix } from "../matrix";

const PREVIEW_LIMIT = 5;
const RULE = "========================================";

export type Reporter = {
  info: (message: string) => void;
  progress: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, cause?: unknown) => void;
};

export function createConsoleReporter(): Reporter {
  return {
    info: (message) => {
      console.log(message);
    },
    progress: (message) => {
      console.log(`>>> ${message}`);
    },
    warn: (message) => {
      console.warn(`WARNING: ${message}`);
    },
    error: (message, cause) => {
      if (cause === undefined) {
        console.error(`ERROR: ${message}`);
        return;
      }

      console.error(`ERROR: ${message}`, cause);
    },
  };
}

export function formatBanner(title: string): string {
  return `${RULE}\n${title}\n${RULE}`;
}

/** At most the top-left 5x5 block, six decimals, `...` where truncated. */
export function formatMatrixPreview(matrix: Matrix, name: string): string {
  const lines = [`${name} (${matrix.rows} x ${matrix.cols}):`];
  const maxRows = Math.min(matrix.rows, PREVIEW_LIMIT);
  const maxCols = Math.min(matrix.cols, PREVIEW_LIMIT);

  for (let i = 0; i < maxRows; i += 1) {
    const cells: string[] = [];

    for (let j = 0; j < maxCols; j += 1) {
      cells.push(matrix.get(i, j).toFixed(6).padStart(10));
    }

    if (matrix.cols > PREVIEW_LIMIT) {
      cells.push("...");
    }

    lines.push(cells.join(" "));
  }

  if (matrix.rows > PREVIEW_LIMIT) {
    lines.push("...");
  }

  return lines.join("\n");
}

export function formatTopEigenvalues(
  eigenvalues: readonly number[],
  nComponents: number,
): string[] {
  const count = Math.min(nComponents, PREVIEW_LIMIT, eigenvalues.length);
  const lines: string[] = [];

  for (let i = 0; i < count; i += 1) {
    lines.push(`  PC${i + 1}: ${eigenvalues[i].toFixed(6)}`);
  }

  return lines;
}

export function formatSamples(matrix: Matrix): string[] {
  const count = Math.min(matrix.rows, PREVIEW_LIMIT);
  const lines: string[] = [];

  for (let i = 0; i < count; i += 1) {
    const values = matrix.row(i).map((value) => value.toFixed(6));
    lines.push(`Sample ${i + 1}: [${values.join(", ")}]`);
  }

  return lines;
}
