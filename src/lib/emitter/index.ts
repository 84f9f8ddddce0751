/**
 * Emitter module - renders inferred schemas for people and for compilers
 */
export * from "./types.js";
export * from "./schema-printer.js";
export * from "./type-generator.js";
