/**
 * Value classification
 *
 * The only place that inspects host runtime types. Everything downstream
 * branches on the tags produced here.
 */

import type {
  JsonScalar,
  JsonValue,
  ScalarKind,
} from "../../types/schema-node.js";
import type { DateFormatToken } from "../../types/date-patterns.js";
import { recognizeDatePattern } from "../../utils/date-patterns.js";

export interface ScalarClassification {
  kind: ScalarKind;
  format?: DateFormatToken;
}

export type TaggedValue =
  | { tag: "object"; entries: [string, JsonValue][] }
  | { tag: "array"; elements: JsonValue[] }
  | ({ tag: "scalar"; value: JsonScalar } & ScalarClassification);

/**
 * Classify one JSON scalar into a kind, with a date/time format for
 * recognized strings
 */
export function classifyScalar(value: JsonScalar): ScalarClassification {
  if (value === null) {
    return { kind: "null" };
  }

  if (typeof value === "boolean") {
    return { kind: "boolean" };
  }

  if (typeof value === "number") {
    return { kind: Number.isSafeInteger(value) ? "integer" : "float" };
  }

  const format = recognizeDatePattern(value);
  return format ? { kind: "string", format } : { kind: "string" };
}

/**
 * Lift any JSON value into a tagged variant
 */
export function tagValue(value: JsonValue): TaggedValue {
  if (Array.isArray(value)) {
    return { tag: "array", elements: value };
  }

  if (value !== null && typeof value === "object") {
    return { tag: "object", entries: Object.entries(value) };
  }

  return { tag: "scalar", value, ...classifyScalar(value) };
}
