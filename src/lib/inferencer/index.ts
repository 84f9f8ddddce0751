/**
 * Inferencer module - schema inference from a parsed JSON document
 */

import type { JsonValue, SchemaNode } from "../../types/schema-node.js";
import {
  DEFAULT_INFERENCE_OPTIONS,
  type InferenceOptions,
} from "../../types/options.js";
import type { InferencerResult, SchemaSummary } from "./types.js";
import { buildSchema } from "./schema-builder.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./value-classifier.js";
export * from "./schema-merger.js";
export * from "./key-grouper.js";
export * from "./schema-builder.js";

/**
 * Collect summary counts over a schema tree
 */
export function summarizeSchema(schema: SchemaNode): SchemaSummary {
  const summary: SchemaSummary = {
    fieldsDiscovered: 0,
    placeholdersCreated: 0,
    mixedTypeSlots: 0,
    schemaDepth: 0,
  };
  const pending: { node: SchemaNode; level: number }[] = [
    { node: schema, level: 0 },
  ];

  let entry = pending.pop();
  while (entry) {
    const { node, level } = entry;
    summary.schemaDepth = Math.max(summary.schemaDepth, level);

    if (node.kind === "object") {
      for (const child of node.properties.values()) {
        summary.fieldsDiscovered++;
        if (child.keyPattern !== undefined) {
          summary.placeholdersCreated++;
        }
        pending.push({ node: child, level: level + 1 });
      }
    } else if (node.kind === "array") {
      pending.push({ node: node.items, level: level + 1 });
    } else if (node.kind === "unknown" && node.occurrenceCount > 0) {
      summary.mixedTypeSlots++;
    }

    entry = pending.pop();
  }

  return summary;
}

/**
 * Main inferencer class
 */
export class Inferencer {
  private options: InferenceOptions;

  constructor(options: Partial<InferenceOptions> = {}) {
    this.options = { ...DEFAULT_INFERENCE_OPTIONS, ...options };
  }

  getOptions(): Readonly<InferenceOptions> {
    return this.options;
  }

  infer(document: JsonValue): InferencerResult {
    const startTime = Date.now();

    logger.debug("Starting schema inference", { options: this.options });

    const schema = buildSchema(document, this.options);
    const summary = summarizeSchema(schema);
    const durationMs = Date.now() - startTime;

    logger.debug("Schema inference complete", { ...summary, durationMs });

    return {
      schema,
      metadata: { ...summary, durationMs },
    };
  }
}
