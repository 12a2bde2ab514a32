import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Matrix } from "../matrix";

export type CsvErrorBody = {
  error: string;
};

const CSV_DECIMALS = 6;

/**
 * Parses headerless, comma-separated numeric text. Blank lines are skipped;
 * the first line fixes the column count.
 */
export function parseCsv(text: string): Matrix | CsvErrorBody {
  const lines = text
    .split(/\r?\n/)
    .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
    .filter(({ line }) => line.length > 0);

  if (lines.length === 0) {
    return { error: "CSV input is empty." };
  }

  const cols = lines[0].line.split(",").length;
  const values: number[][] = [];

  for (const { line, lineNumber } of lines) {
    const cells = line.split(",");

    if (cells.length !== cols) {
      return {
        error: `Line ${lineNumber} has ${cells.length} fields; expected ${cols}.`,
      };
    }

    const row = new Array<number>(cols);

    for (let j = 0; j < cells.length; j += 1) {
      const cell = cells[j].trim();
      const value = Number(cell);

      if (cell.length === 0 || !Number.isFinite(value)) {
        return {
          error: `Line ${lineNumber}, column ${j + 1}: '${cell}' is not a finite number.`,
        };
      }

      row[j] = value;
    }

    values.push(row);
  }

  return Matrix.fromArray(values);
}

export function formatCsv(matrix: Matrix): string {
  let output = "";

  for (let i = 0; i < matrix.rows; i += 1) {
    output +=
      matrix
        .row(i)
        .map((value) => value.toFixed(CSV_DECIMALS))
        .join(",") + "\n";
  }

  return output;
}

export async function readCsv(path: string): Promise<Matrix | CsvErrorBody> {
  let text: string;

  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    return {
      error: `Failed to open '${path}' for reading: ${
        error instanceof Error ? error.message : String(error)
      }`,
    };
  }

  const parsed = parseCsv(text);

  if ("error" in parsed) {
    return { error: `${path}: ${parsed.error}` };
  }

  return parsed;
}

export async function writeCsv(matrix: Matrix, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatCsv(matrix), "utf8");
}
