/**
 * File Classifier
 * Decides which extractor, if any, handles an input file
 */

import * as nodePath from "path";
import type { FileRoute } from "../types/index.js";

export interface ClassifierOptions {
  /** Base-name substrings that mark a dictionary (matched case-insensitively) */
  dictionaryKeywords: readonly string[];
  /** Extensions, with leading dot, routed to the sentence extractor */
  textExtensions: readonly string[];
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  dictionaryKeywords: ["dict", "dictionary"],
  textExtensions: [".txt", ".csv"],
};

/**
 * Routes a file by name
 *
 * A dictionary keyword in the base name wins over the extension, so
 * `words_dict.pdf` is a dictionary even though nothing can parse it.
 */
export function classifyFile(
  filePath: string,
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS
): FileRoute {
  const name = nodePath.basename(filePath).toLowerCase();

  if (
    options.dictionaryKeywords.some((keyword) =>
      name.includes(keyword.toLowerCase())
    )
  ) {
    return "dictionary";
  }

  const extension = nodePath.extname(name);
  if (
    options.textExtensions.some(
      (candidate) => candidate.toLowerCase() === extension
    )
  ) {
    return "text";
  }

  return "ignored";
}
