/**
 * Text Normalizer
 * Strips markup and punctuation noise from raw text and collapses whitespace
 */

/**
 * Angle-bracket tags. Lexical only: no nesting, and a literal `<` in prose
 * swallows text up to the next `>`.
 */
const TAG_PATTERN = /<[^>]+>/g;

/**
 * Anything outside letters, numbers, underscore, whitespace and the
 * punctuation allow-list `- ' . , ; : ! ? ( )`
 */
const DISALLOWED_CHAR_PATTERN = /[^\p{L}\p{N}_\s\-'.,;:!?()]/gu;

const WHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * Normalizes a raw string into cleaned text
 *
 * Non-string input yields an empty string. Characters are removed before
 * whitespace is collapsed, so removing a symbol between two spaces cannot
 * leave a double space behind and `normalize(normalize(x)) === normalize(x)`.
 *
 * @example normalize("<p>Bula   vinaka</p> ★") => "Bula vinaka"
 */
export function normalize(text: unknown): string {
  if (typeof text !== "string" || text === "") {
    return "";
  }

  return text
    .replace(TAG_PATTERN, "")
    .replace(DISALLOWED_CHAR_PATTERN, "")
    .replace(WHITESPACE_RUN_PATTERN, " ")
    .trim();
}
