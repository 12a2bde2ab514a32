import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { buildTimestampedPath } from "../config/pcaConfig";
import { isClientError } from "../errors";
import { readCsv, writeCsv } from "../io/csv";
import type { Matrix } from "../matrix";
import { fit, toModelRecord, transform, type PcaModel } from "../pca";
import {
  formatBanner,
  formatMatrixPreview,
  formatSamples,
  formatTopEigenvalues,
  type Reporter,
} from "../reporting/reporter";
import type { PipelineOptions } from "./args";

async function loadMatrix(
  path: string,
  reporter: Reporter,
): Promise<Matrix | null> {
  reporter.progress("Reading CSV file...");

  const loaded = await readCsv(path);

  if ("error" in loaded) {
    reporter.error(loaded.error);
    return null;
  }

  reporter.info(`  Detected ${loaded.rows} rows x ${loaded.cols} columns`);
  reporter.progress("CSV file loaded successfully");

  return loaded;
}

function describeFailure(step: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const kind = isClientError(error) ? "invalid input" : "internal failure";

  return `${step} (${kind}): ${message}`;
}

async function writeOutputs(
  transformed: Matrix,
  model: PcaModel,
  options: PipelineOptions,
  reporter: Reporter,
): Promise<void> {
  const targets = [options.outputFile];

  if (options.timestamp) {
    targets.push(buildTimestampedPath(options.outputFile, options.timestamp));
  }

  reporter.progress("Writing results to CSV...");

  for (const target of targets) {
    await writeCsv(transformed, target);
    reporter.info(
      `  Wrote ${transformed.rows} rows x ${transformed.cols} columns to ${target}`,
    );
  }

  if (options.modelFile) {
    await mkdir(dirname(options.modelFile), { recursive: true });
    await writeFile(
      options.modelFile,
      JSON.stringify(toModelRecord(model), null, 2) + "\n",
      "utf8",
    );
    reporter.info(`  Wrote model to ${options.modelFile}`);
  }
}

/**
 * Load → fit → reload → transform → write, narrated through `reporter`.
 * Resolves to the process exit code.
 */
export async function runPipeline(
  options: PipelineOptions,
  reporter: Reporter,
): Promise<number> {
  reporter.info(formatBanner("  PCA Engine\n  Principal Component Analysis"));
  reporter.info("Configuration:");
  reporter.info(`  Input file:       ${options.inputFile}`);
  reporter.info(`  Output file:      ${options.outputFile}`);
  reporter.info(`  Components (K):   ${options.nComponents}`);
  reporter.info(`  Solver:           ${options.solver}`);
  reporter.info("");

  reporter.info(formatBanner("Step 1: Loading Data"));

  const data = await loadMatrix(options.inputFile, reporter);

  if (!data) {
    reporter.error("Failed to read input file");
    return 1;
  }

  const { rows, cols } = data;
  reporter.info(`Data loaded: ${rows} samples x ${cols} features`);
  reporter.info(formatMatrixPreview(data, "Input data"));

  let nComponents = options.nComponents;

  if (nComponents > cols) {
    reporter.warn(`n_components (${nComponents}) > n_features (${cols})`);
    reporter.warn(`Setting n_components = ${cols}`);
    nComponents = cols;
  }

  reporter.info(formatBanner("Step 2: Fitting PCA Model"));
  reporter.info(`Input shape: ${rows} samples x ${cols} features`);
  reporter.info(`Target components: ${nComponents}`);

  let model: PcaModel;

  try {
    model = fit(data, nComponents, {
      maxIterations: options.maxIterations,
      tolerance: options.tolerance,
      solver: options.solver,
      onProgress: reporter.progress,
      onWarning: reporter.warn,
    });
  } catch (error) {
    reporter.error(describeFailure("Failed to fit PCA model", error));
    return 1;
  }

  const ratio = model.explainedVarianceRatio;
  reporter.info(
    `Explained variance ratio: ${ratio.toFixed(4)} (${(ratio * 100).toFixed(2)}%)`,
  );
  reporter.info("Top eigenvalues:");
  formatTopEigenvalues(model.eigenvalues, nComponents).forEach((line) =>
    reporter.info(line),
  );

  reporter.info(formatBanner("Step 3: Transforming Data"));

  // fit() centred `data`; transform the file's original values.
  const original = await loadMatrix(options.inputFile, reporter);

  if (!original) {
    reporter.error("Failed to re-read input file");
    return 1;
  }

  let transformed: Matrix;

  try {
    reporter.progress("Projecting data onto principal components...");
    transformed = transform(model, original);
  } catch (error) {
    reporter.error(describeFailure("Failed to transform data", error));
    return 1;
  }

  reporter.info(
    `Transformation complete: ${transformed.rows} samples x ${transformed.cols} components`,
  );

  reporter.info(formatBanner("Step 4: Writing Results"));

  try {
    await writeOutputs(transformed, model, options, reporter);
  } catch (error) {
    reporter.error(describeFailure("Failed to write output file", error));
    return 1;
  }

  reporter.info(formatBanner("Summary"));
  reporter.info(`Original dimensions:      ${rows} x ${cols}`);
  reporter.info(
    `Reduced dimensions:       ${transformed.rows} x ${transformed.cols}`,
  );
  reporter.info(
    `Dimensionality reduction: ${((1 - nComponents / cols) * 100).toFixed(1)}%`,
  );
  reporter.info(`Variance explained:       ${(ratio * 100).toFixed(2)}%`);
  reporter.info(`Output saved to: ${options.outputFile}`);
  reporter.info("First 5 transformed samples:");
  formatSamples(transformed).forEach((line) => reporter.info(line));
  reporter.info(formatBanner("PCA Completed Successfully!"));

  return 0;
}
