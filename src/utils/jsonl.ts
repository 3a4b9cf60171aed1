/**
 * JSON Lines
 * One JSON object per line, newline-terminated, non-ASCII text kept as is
 */

import { errorMessage } from "./logger.js";

/**
 * Serializes records to JSON Lines
 * An empty list serializes to an empty string.
 */
export function serializeJsonl(records: readonly object[]): string {
  return records.map((record) => JSON.stringify(record) + "\n").join("");
}

/**
 * Parses JSON Lines text
 * Blank lines are skipped.
 *
 * @throws Error naming the 1-based line number of the first invalid line
 */
export function parseJsonl(content: string): unknown[] {
  const records: unknown[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }

    try {
      records.push(JSON.parse(line));
    } catch (error) {
      throw new Error(
        `Invalid JSON on line ${index + 1}: ${errorMessage(error)}`
      );
    }
  });

  return records;
}
