/**
 * Narrowing helpers for assertions on schema trees
 */

import type {
  ArraySchemaNode,
  ObjectSchemaNode,
  SchemaNode,
} from '../../src/types/schema-node.js';

export function expectObject(node: SchemaNode): ObjectSchemaNode {
  if (node.kind !== 'object') {
    throw new Error(`Expected an object node, got ${node.kind}`);
  }
  return node;
}

export function expectArray(node: SchemaNode): ArraySchemaNode {
  if (node.kind !== 'array') {
    throw new Error(`Expected an array node, got ${node.kind}`);
  }
  return node;
}

export function property(node: SchemaNode, name: string): SchemaNode {
  const child = expectObject(node).properties.get(name);
  if (!child) {
    throw new Error(`Missing property ${name}`);
  }
  return child;
}

export function propertyNames(node: SchemaNode): string[] {
  return Array.from(expectObject(node).properties.keys());
}

export function formatOf(node: SchemaNode): string | undefined {
  return node.kind === 'string' ? node.format : undefined;
}
