#!/usr/bin/env node
import { parseCliArgs } from "./lib/cli/args";
import { runPipeline } from "./lib/cli/pipeline";
import {
  DEFAULT_COMPONENTS,
  DEFAULT_INPUT_FILE,
  DEFAULT_OUTPUT_FILE,
  getConfigEnvVarNames,
} from "./lib/config/pcaConfig";
import { createConsoleReporter } from "./lib/reporting/reporter";

function printUsage(programName: string) {
  console.log(`
Usage: ${programName} [input_file] [output_file] [n_components] [options]

Arguments:
  input_file    : Path to input CSV file (default: ${DEFAULT_INPUT_FILE})
  output_file   : Path to output CSV file (default: ${DEFAULT_OUTPUT_FILE})
  n_components  : Number of principal components (default: ${DEFAULT_COMPONENTS})

Options:
  --timestamp     Also write <output>_YYYYMMDD_HHMMSS.csv
  --model <file>  Write the fitted model as JSON
  -h, --help      Show this message

Environment:
  ${getConfigEnvVarNames().join(", ")}

Example:
  ${programName} data/input_data.csv data/output_data.csv 3
`);
}

async function main(): Promise<void> {
  const reporter = createConsoleReporter();
  const parsed = parseCliArgs(process.argv.slice(2));

  if (parsed.kind === "help") {
    printUsage("pca-engine");
    return;
  }

  if (parsed.kind === "error") {
    reporter.error(parsed.error);
    printUsage("pca-engine");
    process.exitCode = 1;
    return;
  }

  try {
    process.exitCode = await runPipeline(parsed.options, reporter);
  } catch (error) {
    const normalizedError =
      error instanceof Error ? error : new Error(String(error));

    reporter.error("Unexpected failure while running PCA.", normalizedError);
    process.exitCode = 1;
  }
}

void main();
