/**
 * Command-line interface
 */

import { runPipeline } from "./core/cleaner.js";
import { createLogger, errorMessage, type Logger } from "./utils/logger.js";
import type { StorageProvider } from "./utils/storage.js";

export const DEFAULT_LOG_FILE = "fijian_pipeline.log";

export const USAGE = `Usage: fijian-clean --input <dir> --output <dir> [options]

Fijian Data Cleaning Pipeline

Options:
  -i, --input <dir>     Input directory containing raw data files
  -o, --output <dir>    Output directory for processed data
  -v, --verbose         Enable verbose logging
      --log-file <path> Append log lines to this file (default: ${DEFAULT_LOG_FILE})
      --no-log-file     Log to the console only
  -h, --help            Show this help`;

export interface CliOptions {
  input: string;
  output: string;
  verbose: boolean;
  logFile: string | undefined;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

/**
 * Parses command-line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  let input: string | undefined;
  let output: string | undefined;
  let verbose = false;
  let logFile: string | undefined = DEFAULT_LOG_FILE;

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i] ?? "";
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const flag = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    const takeValue = (): string | undefined => {
      if (inline !== undefined) {
        return inline;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) {
        return undefined;
      }
      i++;
      return next;
    };

    switch (flag) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-v":
      case "--verbose":
        verbose = true;
        break;
      case "--no-log-file":
        logFile = undefined;
        break;
      case "-i":
      case "--input":
      case "-o":
      case "--output":
      case "--log-file": {
        const value = takeValue();
        if (value === undefined || value === "") {
          return { kind: "error", message: `${flag} requires a value` };
        }
        if (flag === "-i" || flag === "--input") {
          input = value;
        } else if (flag === "-o" || flag === "--output") {
          output = value;
        } else {
          logFile = value;
        }
        break;
      }
      default:
        return { kind: "error", message: `Unknown argument: ${raw}` };
    }
  }

  if (input === undefined || output === undefined) {
    const missing = [
      input === undefined ? "--input" : null,
      output === undefined ? "--output" : null,
    ].filter((name): name is string => name !== null);
    return {
      kind: "error",
      message: `Missing required arguments: ${missing.join(", ")}`,
    };
  }

  return { kind: "run", options: { input, output, verbose, logFile } };
}

export interface CliDependencies {
  storage?: StorageProvider;
  /** Replaces the console/file logger built from the arguments */
  logger?: Logger;
}

/**
 * Runs the CLI and resolves to the process exit status
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = {}
): Promise<number> {
  const parsed = parseCliArgs(argv);

  if (parsed.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  if (parsed.kind === "error") {
    console.error(`fijian-clean: ${parsed.message}`);
    console.error(USAGE);
    return 1;
  }

  const { options } = parsed;
  const logger =
    deps.logger ??
    createLogger({
      level: options.verbose ? "debug" : "info",
      logFile: options.logFile,
    });

  try {
    await runPipeline({
      inputDir: options.input,
      outputDir: options.output,
      storage: deps.storage,
      logger,
    });
    return 0;
  } catch (error) {
    logger.error(`Pipeline failed: ${errorMessage(error)}`);
    return 1;
  }
}
