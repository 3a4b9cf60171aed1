/**
 * Core Module Exports
 * Pipeline driver and its one-shot wrapper
 */

export {
  DataCleaner,
  runPipeline,
  type FileOutcome,
} from "./cleaner.js";
