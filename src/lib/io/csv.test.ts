import { appendFile, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Matrix } from "../matrix";
import { formatCsv, parseCsv, readCsv, writeCsv } from "./csv";

describe("parseCsv", () => {
  it("parses numeric rows", () => {
    const parsed = parseCsv("1,2\n3,4.5\n");

    expect(parsed).toBeInstanceOf(Matrix);
    expect((parsed as Matrix).toArray()).toEqual([
      [1, 2],
      [3, 4.5],
    ]);
  });

  it("skips blank lines and accepts CRLF and padded cells", () => {
    const parsed = parseCsv("1, 2\r\n\r\n -3,4e1\r\n");

    expect((parsed as Matrix).toArray()).toEqual([
      [1, 2],
      [-3, 40],
    ]);
  });

  it("reports rows with a different field count", () => {
    expect(parseCsv("1,2\n3\n")).toEqual({
      error: "Line 2 has 1 fields; expected 2.",
    });
  });

  it("reports non-numeric cells with their position", () => {
    expect(parseCsv("1,abc\n")).toEqual({
      error: "Line 1, column 2: 'abc' is not a finite number.",
    });
    expect(parseCsv("1,\n")).toEqual({
      error: "Line 1, column 2: '' is not a finite number.",
    });
  });

  it("reports empty input", () => {
    expect(parseCsv("\n\n")).toEqual({ error: "CSV input is empty." });
  });
});

describe("formatCsv", () => {
  it("writes six decimals per value and one line per row", () => {
    const matrix = Matrix.fromArray([
      [1, -0.5],
      [2.1234567, 3],
    ]);

    expect(formatCsv(matrix)).toBe("1.000000,-0.500000\n2.123457,3.000000\n");
  });
});

describe("readCsv / writeCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pca-csv-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a matrix that reads back unchanged", async () => {
    const path = join(dir, "nested", "out.csv");
    const matrix = Matrix.fromArray([
      [0.25, 1],
      [-2, 3.5],
    ]);

    await writeCsv(matrix, path);

    expect(await readFile(path, "utf8")).toBe(
      "0.250000,1.000000\n-2.000000,3.500000\n",
    );

    const loaded = await readCsv(path);
    expect((loaded as Matrix).toArray()).toEqual(matrix.toArray());
  });

  it("returns an error for a missing file", async () => {
    const result = await readCsv(join(dir, "missing.csv"));

    expect("error" in result).toBe(true);
    expect((result as { error: string }).error).toMatch(
      /^Failed to open '.*missing\.csv' for reading: /,
    );
  });

  it("prefixes parse errors with the file path", async () => {
    const path = join(dir, "bad.csv");
    await writeCsv(Matrix.fromArray([[1, 2]]), path);
    await appendFile(path, "3\n", "utf8");

    expect(await readCsv(path)).toEqual({
      error: `${path}: Line 2 has 1 fields; expected 2.`,
    });
  });
});
