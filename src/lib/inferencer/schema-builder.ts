/**
 * Schema builder
 *
 * Walks a parsed JSON value depth-first and produces its SchemaNode tree.
 * Traversal runs on an explicit work stack, so document nesting depth is
 * limited by memory rather than by the call stack.
 *
 * @module lib/inferencer/schema-builder
 */

import type {
  JsonValue,
  ObjectSchemaNode,
  SchemaNode,
} from "../../types/schema-node.js";
import {
  DEFAULT_INFERENCE_OPTIONS,
  type InferenceOptions,
} from "../../types/options.js";
import { tagValue } from "./value-classifier.js";
import { mergeSchemaNodes, type MergeOptions } from "./schema-merger.js";
import { groupObjectKeys, type KeyGroupingOptions } from "./key-grouper.js";

/**
 * Pending work. `visit` classifies a value; the `finish*` tasks run after
 * all children of a container have been built and pop their results.
 */
type Task =
  | { op: "visit"; value: JsonValue; depth: number }
  | { op: "finishArray"; length: number }
  | { op: "finishObject"; keys: string[]; depth: number };

/**
 * Build the object node for one instance from its children
 */
export function assembleObjectNode(
  keys: readonly string[],
  children: readonly SchemaNode[],
  depth: number,
  options: KeyGroupingOptions & MergeOptions,
): ObjectSchemaNode {
  const properties = new Map<string, SchemaNode>();

  for (const slot of groupObjectKeys(keys, depth, options)) {
    const members = slot.indices.map((index) => children[index]);

    if (slot.pattern === undefined) {
      properties.set(slot.name, members[0]);
      continue;
    }

    properties.set(slot.name, {
      ...mergeSchemaNodes(members, options),
      keyPattern: slot.pattern,
    });
  }

  return {
    kind: "object",
    properties,
    optional: false,
    examples: [],
    occurrenceCount: 1,
  };
}

/**
 * Infer the schema of a JSON value
 *
 * Total over any JSON value; kind conflicts surface as `unknown` nodes.
 *
 * @param value - Parsed document; never mutated
 * @param overrides - Partial options merged over the defaults
 *
 * @example
 * ```typescript
 * const schema = buildSchema([{ a: 1, b: 2 }, { a: 3 }]);
 * // schema.kind === "array"
 * // schema.items.properties.get("b").optional === true
 * ```
 */
export function buildSchema(
  value: JsonValue,
  overrides: Partial<InferenceOptions> = {},
): SchemaNode {
  const options: InferenceOptions = {
    ...DEFAULT_INFERENCE_OPTIONS,
    ...overrides,
  };
  const stack: Task[] = [{ op: "visit", value, depth: 1 }];
  const results: SchemaNode[] = [];

  let task = stack.pop();
  while (task) {
    switch (task.op) {
      case "visit": {
        const tagged = tagValue(task.value);

        if (tagged.tag === "scalar") {
          results.push(
            tagged.kind === "string"
              ? {
                  kind: "string",
                  ...(tagged.format ? { format: tagged.format } : {}),
                  optional: false,
                  examples: options.exampleCap > 0 ? [tagged.value] : [],
                  occurrenceCount: 1,
                }
              : {
                  kind: tagged.kind,
                  optional: false,
                  examples: options.exampleCap > 0 ? [tagged.value] : [],
                  occurrenceCount: 1,
                },
          );
        } else if (tagged.tag === "array") {
          const sampled =
            options.maxArrayItems === undefined
              ? tagged.elements
              : tagged.elements.slice(0, options.maxArrayItems);
          stack.push({ op: "finishArray", length: sampled.length });
          // Pushed in reverse so elements are built, and merged, in order.
          // Array elements stay at the depth of the array itself.
          for (let i = sampled.length - 1; i >= 0; i--) {
            stack.push({ op: "visit", value: sampled[i], depth: task.depth });
          }
        } else {
          stack.push({
            op: "finishObject",
            keys: tagged.entries.map(([key]) => key),
            depth: task.depth,
          });
          for (let i = tagged.entries.length - 1; i >= 0; i--) {
            stack.push({
              op: "visit",
              value: tagged.entries[i][1],
              depth: task.depth + 1,
            });
          }
        }
        break;
      }

      case "finishArray": {
        const elements = results.splice(results.length - task.length);
        results.push({
          kind: "array",
          items: mergeSchemaNodes(elements, options),
          optional: false,
          examples: [],
          occurrenceCount: 1,
        });
        break;
      }

      case "finishObject": {
        const children = results.splice(results.length - task.keys.length);
        results.push(
          assembleObjectNode(task.keys, children, task.depth, options),
        );
        break;
      }
    }

    task = stack.pop();
  }

  const [root] = results;
  return root;
}
