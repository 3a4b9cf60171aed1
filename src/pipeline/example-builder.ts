/**
 * Training-Example Builder
 * Turns dictionary entries and sentences into instruction/input/output triples
 */

import {
  TaskType,
  type DictionaryEntry,
  type TextSentence,
  type TrainingExample,
} from "../types/index.js";

/** Instruction shared by every completion example */
export const COMPLETION_INSTRUCTION = "Complete the following Fijian text:";

/**
 * Instruction for a definition example
 */
export function definitionInstruction(headword: string): string {
  return `Define the Fijian word: ${headword}`;
}

/**
 * Builds a definition example from a dictionary entry
 */
export function buildDefinitionExample(entry: DictionaryEntry): TrainingExample {
  return {
    instruction: definitionInstruction(entry.fijian_word),
    input: entry.fijian_word,
    output: entry.english_definition,
    task_type: TaskType.DEFINITION,
  };
}

/**
 * Builds a completion example by cutting a sentence in half
 *
 * The cut falls at floor(length / 2) code points and may split a word.
 */
export function buildCompletionExample(sentence: TextSentence): TrainingExample {
  const chars = Array.from(sentence);
  const middle = Math.floor(chars.length / 2);

  return {
    instruction: COMPLETION_INSTRUCTION,
    input: chars.slice(0, middle).join(""),
    output: chars.slice(middle).join(""),
    task_type: TaskType.COMPLETION,
  };
}

/**
 * Builds all training examples
 * Definition examples come first, then completion examples, each in input order.
 */
export function buildExamples(
  entries: readonly DictionaryEntry[],
  sentences: readonly TextSentence[]
): TrainingExample[] {
  return [
    ...entries.map(buildDefinitionExample),
    ...sentences.map(buildCompletionExample),
  ];
}
