/**
 * Pipeline Module
 * Exports all pipeline components
 */

export * from "./normalizer.js";
export * from "./validator.js";
export * from "./dictionary-extractor.js";
export * from "./text-extractor.js";
export * from "./example-builder.js";
export * from "./classifier.js";
