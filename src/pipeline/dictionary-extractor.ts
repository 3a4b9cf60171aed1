/**
 * Dictionary Record Extractor
 * Pulls headword/definition pairs out of tabular (CSV) and line-delimited
 * (`headword - definition`) sources
 */

import * as nodePath from "path";
import {
  countUnit,
  createExtractionStats,
  type DictionaryEntry,
  type Extraction,
  type FileResult,
} from "../types/index.js";
import { parseCsv } from "../utils/csv.js";
import { errorMessage, silentLogger, type Logger } from "../utils/logger.js";
import type { StorageProvider } from "../utils/storage.js";
import { normalize } from "./normalizer.js";
import {
  DEFAULT_HEADWORD_VALIDATION_OPTIONS,
  isValid,
  type ValidationOptions,
} from "./validator.js";

/** Column holding the headword in tabular sources */
export const HEADWORD_COLUMN = "fijian_word";
/** Column holding the definition in tabular sources */
export const DEFINITION_COLUMN = "english_definition";
/** Separator between headword and definition in line-delimited sources */
export const LINE_SEPARATOR = " - ";

export interface DictionaryExtractOptions {
  /** Headword thresholds, merged over DEFAULT_HEADWORD_VALIDATION_OPTIONS */
  validation?: Partial<ValidationOptions>;
  logger?: Logger;
}

/**
 * Normalizes a raw pair and applies the acceptance rule: the headword must
 * validate, the definition only has to be non-empty
 */
function toEntry(
  rawHeadword: string,
  rawDefinition: string,
  source: string,
  options: DictionaryExtractOptions
): DictionaryEntry | null {
  const headword = normalize(rawHeadword);
  const definition = normalize(rawDefinition);

  const thresholds = {
    ...DEFAULT_HEADWORD_VALIDATION_OPTIONS,
    ...options.validation,
  };
  if (!isValid(headword, thresholds) || definition === "") {
    return null;
  }

  return {
    fijian_word: headword,
    english_definition: definition,
    source,
  };
}

/**
 * Parses a CSV dictionary
 *
 * Files without both the headword and definition columns yield no entries.
 *
 * @throws Error on malformed CSV (see parseCsv)
 */
export function parseDictionaryCsv(
  content: string,
  fileName: string,
  options: DictionaryExtractOptions = {}
): Extraction<DictionaryEntry> {
  const stats = createExtractionStats();
  const table = parseCsv(content);

  if (
    !table.columns.includes(HEADWORD_COLUMN) ||
    !table.columns.includes(DEFINITION_COLUMN)
  ) {
    options.logger?.debug(
      `${fileName} lacks ${HEADWORD_COLUMN}/${DEFINITION_COLUMN} columns`
    );
    return { records: [], stats };
  }

  const records: DictionaryEntry[] = [];
  for (const row of table.rows) {
    const entry = toEntry(
      row[HEADWORD_COLUMN] ?? "",
      row[DEFINITION_COLUMN] ?? "",
      fileName,
      options
    );
    countUnit(stats, entry !== null);
    if (entry !== null) {
      records.push(entry);
    }
  }

  return { records, stats };
}

/**
 * Parses a line-delimited dictionary (`headword - definition` per line)
 *
 * Line numbers start at 1 and count blank lines, so `source` points at the
 * physical line.
 */
export function parseDictionaryLines(
  content: string,
  fileName: string,
  options: DictionaryExtractOptions = {}
): Extraction<DictionaryEntry> {
  const stats = createExtractionStats();
  const records: DictionaryEntry[] = [];
  const lines = content.split(/\r\n|\r|\n/);

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === "") {
      return;
    }

    const separatorAt = line.indexOf(LINE_SEPARATOR);
    if (separatorAt === -1) {
      countUnit(stats, false);
      return;
    }

    const entry = toEntry(
      line.slice(0, separatorAt),
      line.slice(separatorAt + LINE_SEPARATOR.length),
      `${fileName}:L${index + 1}`,
      options
    );
    countUnit(stats, entry !== null);
    if (entry !== null) {
      records.push(entry);
    }
  });

  return { records, stats };
}

/**
 * Reads one dictionary file and extracts its entries
 *
 * `.csv` files are read as tables and `.txt` files line by line; any other
 * extension yields no entries. Read and parse errors are returned as a
 * failed result rather than thrown.
 */
export async function extractDictionary(
  filePath: string,
  storage: StorageProvider,
  options: DictionaryExtractOptions = {}
): Promise<FileResult<DictionaryEntry>> {
  const logger = options.logger ?? silentLogger;
  const fileName = nodePath.basename(filePath);
  const extension = nodePath.extname(filePath).toLowerCase();

  let parse: typeof parseDictionaryCsv;
  if (extension === ".csv") {
    parse = parseDictionaryCsv;
  } else if (extension === ".txt") {
    parse = parseDictionaryLines;
  } else {
    logger.debug(
      `No dictionary format for ${extension || "extensionless"} file ${filePath}`
    );
    return {
      ok: true,
      file: filePath,
      records: [],
      stats: createExtractionStats(),
    };
  }

  try {
    const content = await storage.readTextFile(filePath);
    const { records, stats } = parse(content, fileName, options);
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
