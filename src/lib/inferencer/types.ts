/**
 * Inferencer module types
 */

import type { SchemaNode } from "../../types/schema-node.js";

export interface SchemaSummary {
  /** Properties across all object nodes, placeholders included */
  fieldsDiscovered: number;

  /** Properties standing for a group of pattern-matched keys */
  placeholdersCreated: number;

  /** Observed slots whose instances disagreed on kind */
  mixedTypeSlots: number;

  /** Levels below the root node */
  schemaDepth: number;
}

export interface InferencerResult {
  schema: SchemaNode;
  metadata: SchemaSummary & {
    durationMs: number;
  };
}
