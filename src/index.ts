/**
 * Fijian Text Pipeline
 * Cleans Fijian dictionary and prose sources into fine-tuning data
 *
 * @example
 * ```typescript
 * import { runPipeline, createLogger } from 'fijian-text-pipeline';
 *
 * const report = await runPipeline({
 *   inputDir: 'data/raw',
 *   outputDir: 'data/processed',
 *   logger: createLogger({ level: 'info' }),
 * });
 * console.log(`${report.examples.length} training examples`);
 * ```
 */

// Re-export types
export * from "./types/index.js";

// Re-export pipeline components
export * from "./pipeline/index.js";

// Re-export configuration
export {
  DEFAULT_PIPELINE_CONFIG,
  resolveConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from "./config/index.js";

// Re-export the driver
export * from "./core/index.js";

// Re-export output writers
export * from "./storage/index.js";

// Re-export utilities
export * from "./utils/index.js";
