/**
 * Core data model for schema inference
 *
 * Parsed JSON flows in as `JsonValue`; the inferencer produces a tree of
 * `SchemaNode`s which emitters only read.
 */

import type { DateFormatToken } from "./date-patterns.js";

export type JsonScalar = string | number | boolean | null;

export type JsonValue = JsonScalar | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type ScalarKind = "string" | "integer" | "float" | "boolean" | "null";

export type SchemaKind = ScalarKind | "object" | "array" | "unknown";

/**
 * Fields shared by every node
 */
interface SchemaNodeBase {
  /** True when at least one sibling instance of the enclosing structure lacked this slot */
  optional: boolean;

  /** Bounded, deduplicated sample of literal values, in traversal order */
  examples: JsonScalar[];

  /** Instances that contributed to this node. Not part of printed output. */
  occurrenceCount: number;

  /** Pattern shared by the sibling keys collapsed into this placeholder slot */
  keyPattern?: DateFormatToken;
}

export interface StringSchemaNode extends SchemaNodeBase {
  kind: "string";
  format?: DateFormatToken;
}

export interface PrimitiveSchemaNode extends SchemaNodeBase {
  kind: "integer" | "float" | "boolean" | "null";
}

export interface ObjectSchemaNode extends SchemaNodeBase {
  kind: "object";
  /** Ordered by first appearance */
  properties: Map<string, SchemaNode>;
}

export interface ArraySchemaNode extends SchemaNodeBase {
  kind: "array";
  items: SchemaNode;
}

/**
 * Slot whose instances disagreed on kind, or that was never observed
 * (`occurrenceCount === 0`, e.g. the items of an empty array)
 */
export interface UnknownSchemaNode extends SchemaNodeBase {
  kind: "unknown";
}

export type SchemaNode =
  | StringSchemaNode
  | PrimitiveSchemaNode
  | ObjectSchemaNode
  | ArraySchemaNode
  | UnknownSchemaNode;
