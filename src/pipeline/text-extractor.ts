/**
 * Text Sentence Extractor
 * Splits prose into sentences and keeps those that survive cleaning and
 * validation
 */

import {
  countUnit,
  createExtractionStats,
  type Extraction,
  type FileResult,
  type TextSentence,
} from "../types/index.js";
import { errorMessage, silentLogger, type Logger } from "../utils/logger.js";
import type { StorageProvider } from "../utils/storage.js";
import { normalize } from "./normalizer.js";
import { isValid, type ValidationOptions } from "./validator.js";

/** Runs of sentence-terminal punctuation; the terminators are dropped */
const SENTENCE_BOUNDARY = /[.!?]+/;

export interface TextExtractOptions {
  validation?: Partial<ValidationOptions>;
  logger?: Logger;
}

/**
 * Splits text into cleaned, validated sentences in source order
 *
 * Blank fragments (such as the empty tail after a final full stop) are not
 * counted as processed units.
 */
export function splitSentences(
  content: string,
  options: TextExtractOptions = {}
): Extraction<TextSentence> {
  const stats = createExtractionStats();
  const records: TextSentence[] = [];

  for (const fragment of content.split(SENTENCE_BOUNDARY)) {
    if (fragment.trim() === "") {
      continue;
    }

    const cleaned = normalize(fragment);
    const kept = isValid(cleaned, options.validation);
    countUnit(stats, kept);
    if (kept) {
      records.push(cleaned);
    }
  }

  return { records, stats };
}

/**
 * Reads one prose file and extracts its sentences
 * Read and decoding errors are returned as a failed result rather than thrown.
 */
export async function extractSentences(
  filePath: string,
  storage: StorageProvider,
  options: TextExtractOptions = {}
): Promise<FileResult<TextSentence>> {
  const logger = options.logger ?? silentLogger;

  try {
    const content = await storage.readTextFile(filePath);
    const { records, stats } = splitSentences(content, options);
    return { ok: true, file: filePath, records, stats };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error processing ${filePath}: ${message}`);
    return {
      ok: false,
      file: filePath,
      error: message,
      records: [],
      stats: createExtractionStats(),
    };
  }
}
