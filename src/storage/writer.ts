/**
 * Output Writers
 * Persists the records of a run as JSON Lines plus a statistics document
 */

import * as nodePath from "path";
import type {
  DictionaryEntry,
  RunStatistics,
  TextSentence,
  TrainingExample,
} from "../types/index.js";
import { serializeJsonl } from "../utils/jsonl.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { StorageProvider } from "../utils/storage.js";

/**
 * File names written into the output directory
 */
export const OUTPUT_FILES = {
  dictionary: "fijian_dictionary.jsonl",
  text: "fijian_text.jsonl",
  training: "fijian_training_data.jsonl",
  stats: "processing_stats.json",
} as const;

/**
 * Everything the writers persist for one run
 */
export interface RunOutputs {
  entries: readonly DictionaryEntry[];
  sentences: readonly TextSentence[];
  examples: readonly TrainingExample[];
  stats: RunStatistics;
}

/**
 * Writes the output files of a run
 *
 * Each JSON Lines file is written only when it has at least one record; the
 * statistics file is always written. Write errors propagate to the caller.
 *
 * @returns Paths of the files written, in write order
 */
export async function writeOutputs(
  outputDir: string,
  outputs: RunOutputs,
  storage: StorageProvider,
  logger: Logger = silentLogger
): Promise<string[]> {
  const written: string[] = [];

  const writeJsonl = async (
    fileName: string,
    records: readonly object[],
    label: string
  ): Promise<void> => {
    if (records.length === 0) {
      return;
    }
    const path = nodePath.join(outputDir, fileName);
    await storage.writeFile(path, serializeJsonl(records));
    written.push(path);
    logger.info(`Saved ${records.length} ${label} to ${path}`);
  };

  await writeJsonl(OUTPUT_FILES.dictionary, outputs.entries, "dictionary entries");
  await writeJsonl(
    OUTPUT_FILES.text,
    outputs.sentences.map((text) => ({ text })),
    "sentences"
  );
  await writeJsonl(OUTPUT_FILES.training, outputs.examples, "training examples");

  const statsPath = nodePath.join(outputDir, OUTPUT_FILES.stats);
  await storage.writeFile(statsPath, JSON.stringify(outputs.stats, null, 2) + "\n");
  written.push(statsPath);
  logger.info(`Processing statistics saved to ${statsPath}`);

  return written;
}
