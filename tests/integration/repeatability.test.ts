import { describe, it, expect } from 'vitest';
import { Inferencer } from '../../src/lib/inferencer/index.js';
import { formatSchemaJson, generateTypeDeclarations } from '../../src/lib/emitter/index.js';
import type { JsonValue } from '../../src/types/index.js';

describe('Schema Inference Repeatability', () => {
  const document: JsonValue = {
    orders: [
      { id: 1, placed: '2024-01-15', lines: [{ sku: 'A', qty: 2 }] },
      { id: 2, placed: '2024-01-16', lines: [], coupon: null },
      { id: '3', placed: '16/01/2024', lines: [{ sku: 'B', qty: 1.5 }] },
    ],
    history: {
      '20240101': { total: 10 },
      '20240102': { total: 12.5 },
      '2024-01-03': { total: 9 },
    },
  };

  it('should render byte-identical output across runs', () => {
    const first = new Inferencer().infer(document).schema;
    const second = new Inferencer().infer(document).schema;

    expect(formatSchemaJson(second)).toBe(formatSchemaJson(first));
    expect(generateTypeDeclarations(second)).toBe(generateTypeDeclarations(first));
  });

  it('should leave the input document untouched', () => {
    const before = JSON.stringify(document);
    new Inferencer().infer(document);
    expect(JSON.stringify(document)).toBe(before);
  });

  it('should report the same summary across runs', () => {
    const { metadata: first } = new Inferencer().infer(document);
    const { metadata: second } = new Inferencer().infer(document);

    expect({ ...second, durationMs: 0 }).toEqual({ ...first, durationMs: 0 });
    expect(first.placeholdersCreated).toBe(2);
  });
});
