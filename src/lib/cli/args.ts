import {
  formatTimestamp,
  getComponentCount,
  getInputFile,
  getMaxIterations,
  getOutputFile,
  getSolver,
  getTimestamp,
  getTolerance,
} from "../config/pcaConfig";
import type { EigenSolver } from "../pca";

export type PipelineOptions = {
  inputFile: string;
  outputFile: string;
  nComponents: number;
  maxIterations: number;
  tolerance: number;
  solver: EigenSolver;
  /** Suffix for an extra, versioned copy of the output file. */
  timestamp: string | null;
  /** Where to write the fitted model as JSON, if anywhere. */
  modelFile: string | null;
};

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "run"; options: PipelineOptions }
  | { kind: "error"; error: string };

/**
 * `[input_file] [output_file] [n_components]` plus `--timestamp`,
 * `--model <file>` and `-h/--help`. Positional values override the
 * environment defaults.
 */
export function parseCliArgs(
  argv: readonly string[],
  now: () => Date = () => new Date(),
): ParsedArgs {
  const positional: string[] = [];
  let timestamp = getTimestamp();
  let modelFile: string | null = null;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    switch (arg) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "--timestamp":
        timestamp = formatTimestamp(now());
        break;
      case "--model": {
        const value = argv[i + 1];

        if (value === undefined || value.startsWith("-")) {
          return { kind: "error", error: "--model requires a file path." };
        }

        modelFile = value;
        i += 1;
        break;
      }
      default:
        if (arg.startsWith("--")) {
          return { kind: "error", error: `Unknown option: ${arg}` };
        }

        positional.push(arg);
    }
  }

  if (positional.length > 3) {
    return {
      kind: "error",
      error: `Too many arguments: expected at most 3, received ${positional.length}.`,
    };
  }

  const [inputFile, outputFile, rawComponents] = positional;
  let nComponents = getComponentCount();

  if (rawComponents !== undefined) {
    const parsed = Number(rawComponents);

    if (!Number.isInteger(parsed) || parsed <= 0) {
      return {
        kind: "error",
        error: "Number of components must be a positive integer.",
      };
    }

    nComponents = parsed;
  }

  return {
    kind: "run",
    options: {
      inputFile: inputFile ?? getInputFile(),
      outputFile: outputFile ?? getOutputFile(),
      nComponents,
      maxIterations: getMaxIterations(),
      tolerance: getTolerance(),
      solver: getSolver(),
      timestamp,
      modelFile,
    },
  };
}
