/**
 * Core record types shared by the extractors, the example builder and the
 * output writers
 */

/**
 * Shape of a training example
 */
export enum TaskType {
  /** Headword in, definition out */
  DEFINITION = "definition",
  /** First half of a sentence in, second half out */
  COMPLETION = "completion",
}

/**
 * A word/definition pair extracted from a dictionary source
 *
 * Field names match the `fijian_dictionary.jsonl` output format.
 */
export interface DictionaryEntry {
  /** Cleaned headword; always passes the validator */
  readonly fijian_word: string;
  /** Cleaned definition; never empty */
  readonly english_definition: string;
  /** Originating file name, with `:L<n>` for line-delimited sources */
  readonly source: string;
}

/**
 * A cleaned sentence that passed the validator on its own
 */
export type TextSentence = string;

/**
 * An instruction/input/output triple for fine-tuning
 */
export interface TrainingExample {
  readonly instruction: string;
  readonly input: string;
  readonly output: string;
  readonly task_type: TaskType;
}

/**
 * Counters accumulated over one run
 */
export interface RunStatistics {
  files_processed: number;
  /** Raw units (rows, lines, fragments) examined by an extractor */
  lines_processed: number;
  /** Raw units that became a record */
  lines_cleaned: number;
  /** Raw units that were rejected */
  lines_removed: number;
}

/**
 * Line-level counters produced by a single extraction
 */
export type ExtractionStats = Omit<RunStatistics, "files_processed">;

/**
 * Records plus counters from a pure parse of one source
 */
export interface Extraction<T> {
  records: T[];
  stats: ExtractionStats;
}

/**
 * Outcome of extracting one file
 *
 * Failures carry no records: a file either contributes everything it parsed
 * or nothing at all.
 */
export type FileResult<T> =
  | {
      ok: true;
      file: string;
      records: T[];
      stats: ExtractionStats;
    }
  | {
      ok: false;
      file: string;
      error: string;
      records: [];
      stats: ExtractionStats;
    };

/**
 * Route chosen for an input file
 */
export type FileRoute = "dictionary" | "text" | "ignored";

/**
 * A per-file failure recorded during a run
 */
export interface FileFailure {
  file: string;
  error: string;
}

/**
 * Everything a pipeline run produced
 */
export interface RunReport {
  stats: RunStatistics;
  entries: DictionaryEntry[];
  sentences: TextSentence[];
  examples: TrainingExample[];
  failures: FileFailure[];
  /** Absolute or provider-relative paths of the files written */
  outputs: string[];
}

/**
 * Creates a zeroed statistics object
 */
export function createRunStatistics(): RunStatistics {
  return {
    files_processed: 0,
    lines_processed: 0,
    lines_cleaned: 0,
    lines_removed: 0,
  };
}

/**
 * Creates zeroed line-level counters
 */
export function createExtractionStats(): ExtractionStats {
  return {
    lines_processed: 0,
    lines_cleaned: 0,
    lines_removed: 0,
  };
}

/**
 * Records one examined unit, kept or not
 */
export function countUnit(stats: ExtractionStats, kept: boolean): void {
  stats.lines_processed += 1;
  if (kept) {
    stats.lines_cleaned += 1;
  } else {
    stats.lines_removed += 1;
  }
}

/**
 * Adds per-file counters into the run totals
 */
export function addExtractionStats(
  total: RunStatistics,
  stats: ExtractionStats
): void {
  total.lines_processed += stats.lines_processed;
  total.lines_cleaned += stats.lines_cleaned;
  total.lines_removed += stats.lines_removed;
}
