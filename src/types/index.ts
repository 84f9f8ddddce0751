// Core re-exports for the jsonsleuth type system
// Module-specific types are exported alongside their modules

export * from "./schema-node.js";
export * from "./date-patterns.js";
export * from "./options.js";
