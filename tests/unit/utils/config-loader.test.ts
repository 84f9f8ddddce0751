import { describe, it, expect, vi } from 'vitest';
import {
  loadInferenceOptions,
  validateInferenceOptions,
} from '../../../src/utils/config-loader.js';
import { DEFAULT_INFERENCE_OPTIONS } from '../../../src/types/options.js';
import { ConfigError } from '../../../src/utils/errors.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  }
}));

describe('config-loader', () => {
  describe('loadInferenceOptions', () => {
    it('should return defaults without CLI flags or config', () => {
      expect(loadInferenceOptions()).toEqual({
        exampleCap: 5,
        abstractDateKeys: true,
        minKeyGroupSize: 1,
        placeholderTemplate: '{pattern}_{depth}',
        maxArrayItems: undefined,
      });
    });

    it('should prefer CLI flags over the config file', () => {
      const options = loadInferenceOptions(
        { exampleCap: 3, sampleSize: 10 },
        { exampleCap: 10, minKeyGroupSize: 2, maxArrayItems: 50 },
      );

      expect(options.exampleCap).toBe(3);
      expect(options.minKeyGroupSize).toBe(2);
      expect(options.maxArrayItems).toBe(10);
    });

    it('should take the placeholder template from the config file', () => {
      const options = loadInferenceOptions({}, { placeholderTemplate: '<{pattern}:{depth}>' });
      expect(options.placeholderTemplate).toBe('<{pattern}:{depth}>');
    });

    it('should let --no-date-keys disable abstraction', () => {
      expect(loadInferenceOptions({ dateKeys: false }, { abstractDateKeys: true }).abstractDateKeys).toBe(false);
    });

    it('should not let the implicit flag default override the config file', () => {
      expect(loadInferenceOptions({ dateKeys: true }, { abstractDateKeys: false }).abstractDateKeys).toBe(false);
      expect(loadInferenceOptions({ dateKeys: true }).abstractDateKeys).toBe(true);
    });

    it('should reject invalid values', () => {
      expect(() => loadInferenceOptions({ exampleCap: -1 })).toThrow(ConfigError);
      expect(() => loadInferenceOptions({ exampleCap: Number.NaN })).toThrow(
        'exampleCap must be a non-negative integer, got NaN',
      );
      expect(() => loadInferenceOptions({ minKeyGroup: 0 })).toThrow(
        'minKeyGroupSize must be an integer >= 1, got 0',
      );
      expect(() => loadInferenceOptions({ sampleSize: 0 })).toThrow(
        'maxArrayItems must be an integer >= 1, got 0',
      );
    });
  });

  describe('validateInferenceOptions', () => {
    it('should accept the defaults', () => {
      expect(() => validateInferenceOptions(DEFAULT_INFERENCE_OPTIONS)).not.toThrow();
    });

    it('should accept a zero example cap', () => {
      expect(() => validateInferenceOptions({ ...DEFAULT_INFERENCE_OPTIONS, exampleCap: 0 })).not.toThrow();
    });

    it('should require both template tokens', () => {
      expect(() =>
        validateInferenceOptions({ ...DEFAULT_INFERENCE_OPTIONS, placeholderTemplate: '{pattern}' }),
      ).toThrow('placeholderTemplate must contain {depth}, got "{pattern}"');
      expect(() =>
        validateInferenceOptions({ ...DEFAULT_INFERENCE_OPTIONS, placeholderTemplate: 'date_{depth}' }),
      ).toThrow('placeholderTemplate must contain {pattern}, got "date_{depth}"');
    });
  });
});
