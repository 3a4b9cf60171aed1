/**
 * Storage Module
 * Output writers for pipeline results
 */

export { OUTPUT_FILES, writeOutputs, type RunOutputs } from "./writer.js";
