/**
 * Pipeline Configuration
 * Defaults and merging for a pipeline run
 */

import {
  DEFAULT_CLASSIFIER_OPTIONS,
  type ClassifierOptions,
} from "../pipeline/classifier.js";
import {
  DEFAULT_HEADWORD_VALIDATION_OPTIONS,
  DEFAULT_VALIDATION_OPTIONS,
  type ValidationOptions,
} from "../pipeline/validator.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { NodeStorageProvider } from "../utils/storage-node.js";
import type { StorageProvider } from "../utils/storage.js";

/**
 * Fully resolved configuration for one run
 */
export interface PipelineConfig extends ClassifierOptions {
  /** Root of the raw input tree */
  inputDir: string;
  /** Directory receiving the output files; created if missing */
  outputDir: string;
  /** Validator thresholds for sentences */
  validation: ValidationOptions;
  /** Validator thresholds for dictionary headwords */
  headwordValidation: ValidationOptions;
  /** File access; defaults to the local file system */
  storage: StorageProvider;
  /** Progress and error log */
  logger: Logger;
}

/**
 * Caller-supplied configuration: directories are required, everything else
 * falls back to DEFAULT_PIPELINE_CONFIG
 */
export type PipelineConfigInput = Pick<PipelineConfig, "inputDir" | "outputDir"> &
  Partial<
    Omit<
      PipelineConfig,
      "inputDir" | "outputDir" | "validation" | "headwordValidation"
    >
  > & {
    validation?: Partial<ValidationOptions>;
    headwordValidation?: Partial<ValidationOptions>;
  };

/**
 * Defaults for every optional setting
 */
export const DEFAULT_PIPELINE_CONFIG: Omit<
  PipelineConfig,
  "inputDir" | "outputDir" | "storage"
> = {
  ...DEFAULT_CLASSIFIER_OPTIONS,
  validation: DEFAULT_VALIDATION_OPTIONS,
  headwordValidation: DEFAULT_HEADWORD_VALIDATION_OPTIONS,
  logger: silentLogger,
};

/**
 * Merges caller configuration over the defaults
 *
 * @throws Error if a directory is empty
 */
export function resolveConfig(input: PipelineConfigInput): PipelineConfig {
  if (input.inputDir.trim() === "") {
    throw new Error("inputDir must not be empty");
  }
  if (input.outputDir.trim() === "") {
    throw new Error("outputDir must not be empty");
  }

  return {
    inputDir: input.inputDir,
    outputDir: input.outputDir,
    dictionaryKeywords:
      input.dictionaryKeywords ?? DEFAULT_PIPELINE_CONFIG.dictionaryKeywords,
    textExtensions: input.textExtensions ?? DEFAULT_PIPELINE_CONFIG.textExtensions,
    validation: { ...DEFAULT_PIPELINE_CONFIG.validation, ...input.validation },
    headwordValidation: {
      ...DEFAULT_PIPELINE_CONFIG.headwordValidation,
      ...input.headwordValidation,
    },
    storage: input.storage ?? new NodeStorageProvider(),
    logger: input.logger ?? DEFAULT_PIPELINE_CONFIG.logger,
  };
}
