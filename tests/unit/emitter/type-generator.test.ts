import { describe, it, expect } from 'vitest';
import {
  formatPropertyKey,
  generateTypeDeclarations,
  toPascalCase,
} from '../../../src/lib/emitter/type-generator.js';
import { buildSchema } from '../../../src/lib/inferencer/schema-builder.js';

describe('type generator', () => {
  describe('toPascalCase', () => {
    it('should join words and capitalize each', () => {
      expect(toPascalCase('created_at')).toBe('CreatedAt');
      expect(toPascalCase('yyyy-mm-dd_1')).toBe('YyyyMmDd1');
      expect(toPascalCase('aB')).toBe('AB');
    });

    it('should fall back for names without letters or digits', () => {
      expect(toPascalCase('')).toBe('Field');
      expect(toPascalCase('___')).toBe('Field');
    });
  });

  describe('formatPropertyKey', () => {
    it('should quote keys that are not identifiers', () => {
      expect(formatPropertyKey('name')).toBe('name');
      expect(formatPropertyKey('first-name')).toBe('"first-name"');
      expect(formatPropertyKey('2021-08-24')).toBe('"2021-08-24"');
    });
  });

  describe('generateTypeDeclarations', () => {
    it('should declare a flat interface', () => {
      expect(generateTypeDeclarations(buildSchema({ id: 1, name: 'x', tags: ['a'] }))).toBe(
        'export interface Root {\n  id: number;\n  name: string;\n  tags: string[];\n}\n',
      );
    });

    it('should declare nested shapes after their parents', () => {
      const schema = buildSchema({
        users: [{ id: 1, email: 'a' }, { id: 2 }],
        meta: { created: '2024-03-20T15:30:00Z' },
      });

      expect(generateTypeDeclarations(schema)).toBe(
        [
          'export interface Root {',
          '  users: RootUsersItem[];',
          '  meta: RootMeta;',
          '}',
          '',
          'export interface RootUsersItem {',
          '  id: number;',
          '  email?: string;',
          '}',
          '',
          'export interface RootMeta {',
          '  /** @format datetime */',
          '  created: string;',
          '}',
          '',
        ].join('\n'),
      );
    });

    it('should render placeholders as an index signature', () => {
      const schema = buildSchema({ '2021-08-24': { count: 1 }, '2021-08-25': { count: 2 } });

      expect(generateTypeDeclarations(schema)).toBe(
        [
          'export interface Root {',
          '  /** Keys matching yyyy-mm-dd */',
          '  [key: string]: RootYyyyMmDd1;',
          '}',
          '',
          'export interface RootYyyyMmDd1 {',
          '  count: number;',
          '}',
          '',
        ].join('\n'),
      );
    });

    it('should widen the index signature over named members', () => {
      const schema = buildSchema({ total: 'all', '2021-08-24': 1 });

      expect(generateTypeDeclarations(schema)).toBe(
        [
          'export interface Root {',
          '  total: string;',
          '  /** Keys matching yyyy-mm-dd */',
          '  [key: string]: number | string;',
          '}',
          '',
        ].join('\n'),
      );
    });

    it('should alias non-object roots', () => {
      expect(generateTypeDeclarations(buildSchema('x'))).toBe('export type Root = string;\n');
      expect(generateTypeDeclarations(buildSchema({}))).toBe(
        'export type Root = Record<string, unknown>;\n',
      );
      expect(generateTypeDeclarations(buildSchema([{ a: 1 }]))).toBe(
        'export type Root = RootItem[];\n\nexport interface RootItem {\n  a: number;\n}\n',
      );
    });

    it('should map null and mixed values', () => {
      expect(generateTypeDeclarations(buildSchema({ v: null, w: [1, 'a'], x: [[]] }))).toBe(
        'export interface Root {\n  v: null;\n  w: unknown[];\n  x: unknown[][];\n}\n',
      );
    });

    it('should document mixed properties', () => {
      const schema = buildSchema([{ v: 1 }, { v: 'a' }]);

      expect(generateTypeDeclarations(schema, { rootName: 'Row' })).toBe(
        [
          'export type Row = RowItem[];',
          '',
          'export interface RowItem {',
          '  /** Mixed types observed */',
          '  v: unknown;',
          '}',
          '',
        ].join('\n'),
      );
    });

    it('should quote keys that are not identifiers', () => {
      expect(generateTypeDeclarations(buildSchema({ 'first-name': 'a' }), { rootName: 'Person' })).toBe(
        'export interface Person {\n  "first-name": string;\n}\n',
      );
    });

    it('should suffix colliding declaration names', () => {
      const schema = buildSchema({ a: { b: { x: 1 } }, aB: { y: 1 } });

      expect(generateTypeDeclarations(schema)).toBe(
        [
          'export interface Root {',
          '  a: RootA;',
          '  aB: RootAB2;',
          '}',
          '',
          'export interface RootA {',
          '  b: RootAB;',
          '}',
          '',
          'export interface RootAB {',
          '  x: number;',
          '}',
          '',
          'export interface RootAB2 {',
          '  y: number;',
          '}',
          '',
        ].join('\n'),
      );
    });
  });
});
