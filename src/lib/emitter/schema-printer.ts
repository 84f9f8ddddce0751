/**
 * Schema printing - JSON view and indented text tree
 */

import type { SchemaNode } from "../../types/schema-node.js";
import type { SchemaJson, TreeRenderOptions } from "./types.js";

const DEFAULT_TREE_OPTIONS: TreeRenderOptions = {
  rootLabel: "$",
  indent: 2,
};

/**
 * Note shown for `unknown` nodes so they never read as a concrete type
 */
export function describeUnknown(node: SchemaNode): string | undefined {
  if (node.kind !== "unknown") {
    return undefined;
  }
  return node.occurrenceCount > 0 ? "mixed types observed" : "no values observed";
}

/**
 * Convert a schema node to its printable JSON shape. Occurrence counts are
 * internal and left out.
 */
export function toSchemaJson(node: SchemaNode): SchemaJson {
  const result: SchemaJson = { type: node.kind };

  if (node.kind === "string" && node.format) {
    result.format = node.format;
  }
  if (node.keyPattern) {
    result.keyPattern = node.keyPattern;
  }
  if (node.optional) {
    result.optional = true;
  }

  const description = describeUnknown(node);
  if (description) {
    result.description = description;
  }

  if (node.examples.length > 0) {
    result.examples = [...node.examples];
  }

  if (node.kind === "object") {
    // Defined as own entries: assigning a "__proto__" key would set the prototype
    result.properties = Object.fromEntries(
      Array.from(node.properties, ([name, child]): [string, SchemaJson] => [
        name,
        toSchemaJson(child),
      ]),
    );
  } else if (node.kind === "array") {
    result.items = toSchemaJson(node.items);
  }

  return result;
}

/**
 * Serialize a schema as indented JSON text
 */
export function formatSchemaJson(node: SchemaNode, indent = 2): string {
  return JSON.stringify(toSchemaJson(node), null, indent);
}

function describeLine(name: string, node: SchemaNode): string {
  let line = `${name}${node.optional ? "?" : ""}: ${node.kind}`;

  if (node.kind === "string" && node.format) {
    line += ` (${node.format})`;
  }
  if (node.keyPattern) {
    line += ` {${node.keyPattern} keys}`;
  }

  const description = describeUnknown(node);
  if (description) {
    line += ` (${description})`;
  }

  if (node.examples.length > 0) {
    line += `  e.g. ${node.examples.map((value) => JSON.stringify(value)).join(", ")}`;
  }

  return line;
}

function renderLines(
  name: string,
  node: SchemaNode,
  level: number,
  options: TreeRenderOptions,
  lines: string[],
): void {
  lines.push(" ".repeat(level * options.indent) + describeLine(name, node));

  if (node.kind === "object") {
    for (const [childName, child] of node.properties) {
      renderLines(childName, child, level + 1, options, lines);
    }
  } else if (node.kind === "array") {
    renderLines("[]", node.items, level + 1, options, lines);
  }
}

/**
 * Render a schema as an indented tree, one line per node
 *
 * @example
 * ```text
 * $: array
 *   []: object
 *     a: integer  e.g. 1, 3
 *     b?: integer  e.g. 2
 * ```
 */
export function renderSchemaTree(
  node: SchemaNode,
  options: Partial<TreeRenderOptions> = {},
): string {
  const resolved = { ...DEFAULT_TREE_OPTIONS, ...options };
  const lines: string[] = [];
  renderLines(resolved.rootLabel, node, 0, resolved, lines);
  return lines.join("\n");
}
