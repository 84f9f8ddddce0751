/**
 * Emitter module types
 */

import type { DateFormatToken } from "../../types/date-patterns.js";
import type { JsonScalar, SchemaKind } from "../../types/schema-node.js";

export type OutputFormat = "json" | "tree";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "tree"];

/**
 * JSON-shaped view of a schema node as shown to end users
 */
export interface SchemaJson {
  type: SchemaKind;
  format?: DateFormatToken;
  keyPattern?: DateFormatToken;
  optional?: true;
  description?: string;
  examples?: JsonScalar[];
  properties?: Record<string, SchemaJson>;
  items?: SchemaJson;
}

export interface TreeRenderOptions {
  /** Label printed for the root node */
  rootLabel: string;
  /** Spaces per nesting level */
  indent: number;
}

export interface TypeGeneratorOptions {
  /** Name of the top-level declaration */
  rootName: string;
}
