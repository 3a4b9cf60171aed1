/**
 * Utils Module
 * Exports utility functions
 */

export * from "./csv.js";
export * from "./jsonl.js";
export * from "./logger.js";
export * from "./storage.js";
export * from "./storage-node.js";
export * from "./storage-memory.js";
