import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  decodeDocument,
  loadJsonDocument,
  parseJsonDocument,
} from '../../../src/lib/loader/index.js';
import { FileIOError, MalformedJsonError, ErrorCode } from '../../../src/utils/errors.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  }
}));

describe('document loader', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'jsonsleuth-loader-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('decodeDocument', () => {
    it('should decode UTF-8 and drop a byte order mark', () => {
      const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('{"a":"é"}', 'utf-8')]);

      expect(decodeDocument(bytes)).toEqual({ text: '{"a":"é"}', encoding: 'utf-8' });
    });

    it('should fall back to Latin-1 for invalid UTF-8', () => {
      const bytes = Buffer.from('{"name":"café"}', 'latin1');

      expect(decodeDocument(bytes)).toEqual({ text: '{"name":"café"}', encoding: 'latin1' });
    });
  });

  describe('parseJsonDocument', () => {
    it('should parse any JSON value', () => {
      expect(parseJsonDocument('[1, "a", null]')).toEqual([1, 'a', null]);
      expect(parseJsonDocument('"text"')).toBe('text');
    });

    it('should reject whitespace-only input', () => {
      expect(() => parseJsonDocument('  \n', 'inline')).toThrow('Document is empty: inline');
    });

    it('should reject malformed input with the source in the details', () => {
      try {
        parseJsonDocument('{"a": 1,}', 'inline');
        expect.fail('expected a MalformedJsonError');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedJsonError);
        if (error instanceof MalformedJsonError) {
          expect(error.code).toBe(ErrorCode.MALFORMED_JSON);
          expect(error.details).toMatchObject({ source: 'inline' });
          expect(error.message).toMatch(/^Malformed JSON in inline: /);
          expect(error.cause).toBeInstanceOf(SyntaxError);
        }
      }
    });
  });

  describe('loadJsonDocument', () => {
    it('should load a document from disk', async () => {
      const filePath = path.join(workDir, 'doc.json');
      await fs.writeFile(filePath, JSON.stringify({ a: [1, 2] }));

      await expect(loadJsonDocument(filePath)).resolves.toEqual({ a: [1, 2] });
    });

    it('should load Latin-1 files', async () => {
      const filePath = path.join(workDir, 'latin.json');
      await fs.writeFile(filePath, Buffer.from('{"city":"Zürich"}', 'latin1'));

      await expect(loadJsonDocument(filePath)).resolves.toEqual({ city: 'Zürich' });
    });

    it('should throw FileIOError for a missing file', async () => {
      const filePath = path.join(workDir, 'missing.json');

      await expect(loadJsonDocument(filePath)).rejects.toBeInstanceOf(FileIOError);
      await expect(loadJsonDocument(filePath)).rejects.toThrow(/Failed to read document from/);
    });

    it('should throw MalformedJsonError for a truncated file', async () => {
      const filePath = path.join(workDir, 'broken.json');
      await fs.writeFile(filePath, '{"a":');

      await expect(loadJsonDocument(filePath)).rejects.toBeInstanceOf(MalformedJsonError);
    });

    it('should throw MalformedJsonError for an empty file', async () => {
      const filePath = path.join(workDir, 'empty.json');
      await fs.writeFile(filePath, '');

      await expect(loadJsonDocument(filePath)).rejects.toThrow(`Document is empty: ${filePath}`);
    });
  });
});
