/**
 * Text Validator
 * Heuristic gate deciding whether a cleaned string looks like a phrase of
 * natural language
 */

/**
 * Thresholds used by the validator
 */
export interface ValidationOptions {
  /** Minimum length of the trimmed text, in code points */
  minLength: number;
  /** Minimum number of whitespace-delimited words */
  minWords: number;
  /** Minimum share of letters among all code points of the untrimmed text */
  minAlphaRatio: number;
}

/**
 * Default validation thresholds
 */
export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  minLength: 3,
  minWords: 2,
  minAlphaRatio: 0.6,
};

/**
 * Thresholds for dictionary headwords
 *
 * Headwords are usually single words, which the phrase rule would always
 * reject, so only one word is required. Length and letter ratio still apply.
 */
export const DEFAULT_HEADWORD_VALIDATION_OPTIONS: ValidationOptions = {
  ...DEFAULT_VALIDATION_OPTIONS,
  minWords: 1,
};

const LETTER_PATTERN = /\p{L}/u;

/**
 * Counts whitespace-delimited words
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word !== "").length;
}

/**
 * Share of letters among the code points of `text` (0 for empty text)
 */
export function alphaRatio(text: string): number {
  const chars = Array.from(text);
  if (chars.length === 0) {
    return 0;
  }

  let letters = 0;
  for (const char of chars) {
    if (LETTER_PATTERN.test(char)) {
      letters++;
    }
  }

  return letters / chars.length;
}

/**
 * Checks whether text is plausible natural-language content
 *
 * Rejects text that is too short, a single token, or mostly non-letters.
 * All three conditions are independent; the order only short-circuits.
 */
export function isValid(
  text: string,
  options: Partial<ValidationOptions> = {}
): boolean {
  const opts: ValidationOptions = { ...DEFAULT_VALIDATION_OPTIONS, ...options };

  const trimmed = text.trim();
  if (Array.from(trimmed).length < opts.minLength) {
    return false;
  }

  if (countWords(trimmed) < opts.minWords) {
    return false;
  }

  // Ratio is taken over the string as given, surrounding whitespace included
  return alphaRatio(text) >= opts.minAlphaRatio;
}
