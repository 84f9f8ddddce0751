/**
 * jsonsleuth: infer normalized, human-readable schemas from JSON documents
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/inferencer/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/emitter/index.js";

// Utilities
export * from "./utils/date-patterns.js";
export * from "./utils/config-loader.js";
export * from "./utils/errors.js";
export * from "./utils/logger.js";
