/**
 * Pipeline Driver
 * Walks the input tree, routes each file to an extractor, and writes the
 * aggregated results
 */

import * as nodePath from "path";
import {
  resolveConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from "../config/index.js";
import { classifyFile } from "../pipeline/classifier.js";
import { extractDictionary } from "../pipeline/dictionary-extractor.js";
import { buildExamples } from "../pipeline/example-builder.js";
import { extractSentences } from "../pipeline/text-extractor.js";
import { writeOutputs } from "../storage/writer.js";
import {
  addExtractionStats,
  createExtractionStats,
  createRunStatistics,
  type DictionaryEntry,
  type ExtractionStats,
  type FileFailure,
  type FileRoute,
  type RunReport,
  type RunStatistics,
  type TextSentence,
} from "../types/index.js";
import { errorMessage } from "../utils/logger.js";

/**
 * Result of handling a single input file
 */
export interface FileOutcome {
  file: string;
  route: FileRoute;
  entries: DictionaryEntry[];
  sentences: TextSentence[];
  stats: ExtractionStats;
  failure?: FileFailure;
}

/**
 * Runs the cleaning pipeline over one input tree
 *
 * @example
 * ```typescript
 * const cleaner = new DataCleaner({ inputDir: 'data/raw', outputDir: 'data/processed' });
 * const report = await cleaner.run();
 * console.log(report.stats.files_processed);
 * ```
 */
export class DataCleaner {
  readonly config: PipelineConfig;

  constructor(config: PipelineConfigInput) {
    this.config = resolveConfig(config);
  }

  /**
   * Handles one file: classify, extract, and report what it contributed
   * Never throws for file-level problems; those come back as `failure`.
   */
  async processFile(filePath: string): Promise<FileOutcome> {
    const { storage, logger, validation, headwordValidation } = this.config;
    const route = classifyFile(filePath, this.config);
    const name = nodePath.basename(filePath);

    logger.info(`Processing ${filePath}`);

    if (route === "dictionary") {
      const result = await extractDictionary(filePath, storage, {
        validation: headwordValidation,
        logger,
      });
      logger.info(
        `Extracted ${result.records.length} dictionary entries from ${name}`
      );
      return {
        file: filePath,
        route,
        entries: result.records,
        sentences: [],
        stats: result.stats,
        failure: result.ok ? undefined : { file: filePath, error: result.error },
      };
    }

    if (route === "text") {
      const result = await extractSentences(filePath, storage, {
        validation,
        logger,
      });
      logger.info(`Extracted ${result.records.length} sentences from ${name}`);
      return {
        file: filePath,
        route,
        entries: [],
        sentences: result.records,
        stats: result.stats,
        failure: result.ok ? undefined : { file: filePath, error: result.error },
      };
    }

    logger.debug(`Skipping ${filePath}: no extractor for this file type`);
    return {
      file: filePath,
      route,
      entries: [],
      sentences: [],
      stats: createExtractionStats(),
    };
  }

  /**
   * Runs the whole pipeline
   *
   * Files are processed one at a time in path order. Per-file failures are
   * logged and listed in the report; problems with the input or output
   * directories, or with writing results, reject the returned promise.
   */
  async run(): Promise<RunReport> {
    const { inputDir, outputDir, storage, logger } = this.config;
    const stats: RunStatistics = createRunStatistics();
    const entries: DictionaryEntry[] = [];
    const sentences: TextSentence[] = [];
    const failures: FileFailure[] = [];

    logger.info("Starting Fijian data cleaning pipeline");
    logger.info(`Input directory: ${inputDir}`);
    logger.info(`Output directory: ${outputDir}`);

    try {
      await storage.mkdir(outputDir);
    } catch (error) {
      throw new Error(
        `Cannot create output directory ${outputDir}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    let files: string[];
    try {
      files = await storage.listFiles(inputDir);
    } catch (error) {
      throw new Error(
        `Cannot read input directory ${inputDir}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    for (const file of files) {
      const outcome = await this.processFile(file);
      for (const entry of outcome.entries) {
        entries.push(entry);
      }
      for (const sentence of outcome.sentences) {
        sentences.push(sentence);
      }
      addExtractionStats(stats, outcome.stats);
      if (outcome.failure !== undefined) {
        failures.push(outcome.failure);
      }
      stats.files_processed += 1;
    }

    const examples = buildExamples(entries, sentences);
    const outputs = await writeOutputs(
      outputDir,
      { entries, sentences, examples, stats },
      storage,
      logger
    );

    logger.info("Pipeline completed successfully");
    logger.info(`Statistics: ${JSON.stringify(stats)}`);

    return { stats, entries, sentences, examples, failures, outputs };
  }
}

/**
 * Convenience wrapper: resolves the configuration and runs once
 */
export async function runPipeline(config: PipelineConfigInput): Promise<RunReport> {
  return new DataCleaner(config).run();
}
