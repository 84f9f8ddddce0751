/**
 * Schema merging
 *
 * Unifies nodes that describe repeated observations of one logical slot:
 * the elements of an array, or the values of sibling keys collapsed into a
 * placeholder. Merging is total; kind disagreements degrade to `unknown`.
 *
 * @module lib/inferencer/schema-merger
 */

import type {
  JsonScalar,
  SchemaNode,
  UnknownSchemaNode,
} from "../../types/schema-node.js";
import { DEFAULT_INFERENCE_OPTIONS } from "../../types/options.js";

export interface MergeOptions {
  exampleCap: number;
}

const DEFAULT_MERGE_OPTIONS: MergeOptions = {
  exampleCap: DEFAULT_INFERENCE_OPTIONS.exampleCap,
};

/**
 * Identity of an example for deduplication. The string "123" and the
 * number 123 are different examples.
 */
export function exampleKey(value: JsonScalar): string {
  return value === null ? "null" : `${typeof value}:${String(value)}`;
}

/**
 * Deduplicated concatenation, truncated to the first `cap` entries
 */
export function combineExamples(
  first: readonly JsonScalar[],
  second: readonly JsonScalar[],
  cap: number,
): JsonScalar[] {
  const result: JsonScalar[] = [];
  const seen = new Set<string>();

  for (const value of [...first, ...second]) {
    if (result.length >= cap) {
      break;
    }
    const key = exampleKey(value);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }

  return result;
}

/**
 * Node for a slot with no observations, such as the items of an empty array.
 * It is the identity element of the merge.
 */
export function createUnobservedNode(): UnknownSchemaNode {
  return {
    kind: "unknown",
    optional: false,
    examples: [],
    occurrenceCount: 0,
  };
}

export function markOptional(node: SchemaNode): SchemaNode {
  return node.optional ? node : { ...node, optional: true };
}

type MergeBase = Pick<
  SchemaNode,
  "optional" | "examples" | "occurrenceCount" | "keyPattern"
>;

/**
 * One property of a merged object: either merged from both sides, or taken
 * from the only side that has it
 */
type PropertyPlan =
  | { key: string; merged: true; left: SchemaNode; right: SchemaNode }
  | { key: string; merged: false; node: SchemaNode };

/**
 * Pending work. `merge` unifies one pair; the `finish*` tasks run once the
 * child pairs of a container have been merged and pop their results.
 */
type MergeTask =
  | { op: "merge"; a: SchemaNode; b: SchemaNode }
  | { op: "finishArray"; base: MergeBase }
  | { op: "finishObject"; base: MergeBase; plan: PropertyPlan[] };

function mergeBase(
  a: SchemaNode,
  b: SchemaNode,
  options: MergeOptions,
): MergeBase {
  return {
    optional: a.optional || b.optional,
    examples: combineExamples(a.examples, b.examples, options.exampleCap),
    occurrenceCount: a.occurrenceCount + b.occurrenceCount,
    ...(a.keyPattern !== undefined && a.keyPattern === b.keyPattern
      ? { keyPattern: a.keyPattern }
      : {}),
  };
}

/**
 * Key union in first-appearance order; a key on one side only is optional
 */
function planProperties(
  left: Map<string, SchemaNode>,
  right: Map<string, SchemaNode>,
): PropertyPlan[] {
  const plan: PropertyPlan[] = [];

  for (const [key, leftChild] of left) {
    const rightChild = right.get(key);
    plan.push(
      rightChild
        ? { key, merged: true, left: leftChild, right: rightChild }
        : { key, merged: false, node: markOptional(leftChild) },
    );
  }

  for (const [key, rightChild] of right) {
    if (!left.has(key)) {
      plan.push({ key, merged: false, node: markOptional(rightChild) });
    }
  }

  return plan;
}

/**
 * Merge two observations of the same slot
 *
 * Kind and format of the result do not depend on argument order. Runs on an
 * explicit work stack, so nesting depth is not bounded by the call stack.
 */
export function mergeSchemaPair(
  a: SchemaNode,
  b: SchemaNode,
  options: MergeOptions = DEFAULT_MERGE_OPTIONS,
): SchemaNode {
  const stack: MergeTask[] = [{ op: "merge", a, b }];
  const results: SchemaNode[] = [];

  let task = stack.pop();
  while (task) {
    switch (task.op) {
      case "merge": {
        const { a: left, b: right } = task;

        if (left.occurrenceCount === 0) {
          results.push(left.optional ? markOptional(right) : right);
          break;
        }
        if (right.occurrenceCount === 0) {
          results.push(right.optional ? markOptional(left) : left);
          break;
        }

        const base = mergeBase(left, right, options);

        if (left.kind === "string" && right.kind === "string") {
          results.push({
            kind: "string",
            ...base,
            // Strict agreement: a mix of formatted and plain strings is plain
            ...(left.format !== undefined && left.format === right.format
              ? { format: left.format }
              : {}),
          });
        } else if (left.kind === "object" && right.kind === "object") {
          const plan = planProperties(left.properties, right.properties);
          stack.push({ op: "finishObject", base, plan });
          // Reversed so merged children land in results in key order
          for (let i = plan.length - 1; i >= 0; i--) {
            const entry = plan[i];
            if (entry.merged) {
              stack.push({ op: "merge", a: entry.left, b: entry.right });
            }
          }
        } else if (left.kind === "array" && right.kind === "array") {
          stack.push({ op: "finishArray", base });
          stack.push({ op: "merge", a: left.items, b: right.items });
        } else if (
          (left.kind === "integer" ||
            left.kind === "float" ||
            left.kind === "boolean" ||
            left.kind === "null") &&
          left.kind === right.kind
        ) {
          results.push({ kind: left.kind, ...base });
        } else {
          results.push({ kind: "unknown", ...base });
        }
        break;
      }

      case "finishArray": {
        const [items] = results.splice(results.length - 1);
        results.push({ kind: "array", ...task.base, items });
        break;
      }

      case "finishObject": {
        const mergedCount = task.plan.filter((entry) => entry.merged).length;
        const children = results.splice(results.length - mergedCount);
        const properties = new Map<string, SchemaNode>();

        let next = 0;
        for (const entry of task.plan) {
          properties.set(entry.key, entry.merged ? children[next++] : entry.node);
        }

        results.push({ kind: "object", ...task.base, properties });
        break;
      }
    }

    task = stack.pop();
  }

  const [merged] = results;
  return merged;
}

/**
 * Merge any number of observations by folding them pairwise, left to right
 *
 * @returns The merged node, or an unobserved `unknown` node for no input
 *
 * @example
 * ```typescript
 * const merged = mergeSchemaNodes([buildSchema("123"), buildSchema(123)]);
 * // merged.kind === "unknown", merged.examples deep-equals ["123", 123]
 * ```
 */
export function mergeSchemaNodes(
  nodes: readonly SchemaNode[],
  options: MergeOptions = DEFAULT_MERGE_OPTIONS,
): SchemaNode {
  if (nodes.length === 0) {
    return createUnobservedNode();
  }

  return nodes.reduce((merged, node) => mergeSchemaPair(merged, node, options));
}
