/**
 * TypeScript declaration generator
 *
 * Renders an inferred schema as interfaces: one per object shape, named
 * from the chain of property names leading to it. Placeholder properties
 * become index signatures.
 */

import type { ObjectSchemaNode, SchemaNode } from "../../types/schema-node.js";
import type { TypeGeneratorOptions } from "./types.js";

const DEFAULT_GENERATOR_OPTIONS: TypeGeneratorOptions = {
  rootName: "Root",
};

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * PascalCase a property name for use inside a declaration name
 *
 * @example
 * toPascalCase("created_at"); // "CreatedAt"
 * toPascalCase("yyyy-mm-dd_1"); // "YyyyMmDd1"
 */
export function toPascalCase(name: string): string {
  const pascal = name
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join("");
  return pascal.length > 0 ? pascal : "Field";
}

export function formatPropertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function unionOf(types: readonly string[]): string {
  return Array.from(new Set(types)).join(" | ");
}

function arrayOf(itemType: string): string {
  return itemType.includes(" | ") ? `(${itemType})[]` : `${itemType}[]`;
}

function docComment(node: SchemaNode): string | undefined {
  if (node.kind === "string" && node.format) {
    return `@format ${node.format}`;
  }
  if (node.kind === "unknown" && node.occurrenceCount > 0) {
    return "Mixed types observed";
  }
  return undefined;
}

class DeclarationWriter {
  private readonly declarations: string[] = [];
  private readonly usedNames = new Set<string>();

  private reserveName(hint: string): string {
    let name = hint;
    let suffix = 2;
    while (this.usedNames.has(name)) {
      name = `${hint}${suffix++}`;
    }
    this.usedNames.add(name);
    return name;
  }

  typeFor(node: SchemaNode, nameHint: string): string {
    switch (node.kind) {
      case "string":
        return "string";
      case "integer":
      case "float":
        return "number";
      case "boolean":
        return "boolean";
      case "null":
        return "null";
      case "unknown":
        return "unknown";
      case "array":
        return arrayOf(this.typeFor(node.items, `${nameHint}Item`));
      case "object":
        return node.properties.size === 0
          ? "Record<string, unknown>"
          : this.declareInterface(node, nameHint);
    }
  }

  private declareInterface(node: ObjectSchemaNode, nameHint: string): string {
    const name = this.reserveName(nameHint);
    // Reserve the slot first so parents precede their nested shapes
    const slot = this.declarations.length;
    this.declarations.push("");

    const lines: string[] = [`export interface ${name} {`];
    const indexPatterns: string[] = [];
    const indexTypes: string[] = [];
    const memberTypes: string[] = [];

    for (const [propertyName, child] of node.properties) {
      const type = this.typeFor(child, `${name}${toPascalCase(propertyName)}`);

      if (child.keyPattern !== undefined) {
        indexPatterns.push(child.keyPattern);
        indexTypes.push(type);
        continue;
      }

      memberTypes.push(type);
      if (child.optional) {
        memberTypes.push("undefined");
      }

      const comment = docComment(child);
      if (comment) {
        lines.push(`  /** ${comment} */`);
      }
      lines.push(
        `  ${formatPropertyKey(propertyName)}${child.optional ? "?" : ""}: ${type};`,
      );
    }

    if (indexPatterns.length > 0) {
      // Every named member must be assignable to the index signature
      lines.push(
        `  /** Keys matching ${Array.from(new Set(indexPatterns)).join(", ")} */`,
      );
      lines.push(`  [key: string]: ${unionOf([...indexTypes, ...memberTypes])};`);
    }

    lines.push("}");
    this.declarations[slot] = lines.join("\n");
    return name;
  }

  declareRoot(node: SchemaNode, rootName: string): void {
    if (node.kind === "object" && node.properties.size > 0) {
      this.declareInterface(node, rootName);
      return;
    }

    const name = this.reserveName(rootName);
    const slot = this.declarations.length;
    this.declarations.push("");
    this.declarations[slot] = `export type ${name} = ${this.typeFor(node, rootName)};`;
  }

  toString(): string {
    return this.declarations.join("\n\n") + "\n";
  }
}

/**
 * Generate TypeScript declarations for an inferred schema
 *
 * @example
 * ```typescript
 * generateTypeDeclarations(buildSchema({ id: 1, tags: ["a"] }));
 * // export interface Root {
 * //   id: number;
 * //   tags: string[];
 * // }
 * ```
 */
export function generateTypeDeclarations(
  schema: SchemaNode,
  options: Partial<TypeGeneratorOptions> = {},
): string {
  const { rootName } = { ...DEFAULT_GENERATOR_OPTIONS, ...options };
  const writer = new DeclarationWriter();
  writer.declareRoot(schema, rootName);
  return writer.toString();
}
