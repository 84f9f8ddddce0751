/**
 * Configuration loader for schema inference options
 */

import {
  DEFAULT_INFERENCE_OPTIONS,
  type InferenceOptions,
} from "../types/options.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * CLI options affecting inference
 */
export interface InferenceCliOptions {
  exampleCap?: number;
  sampleSize?: number;
  minKeyGroup?: number;
  /** commander sets this to false for --no-date-keys and true otherwise */
  dateKeys?: boolean;
  placeholderTemplate?: string;
}

/**
 * Config file section for inference
 */
export type InferenceConfigSection = Partial<InferenceOptions>;

/**
 * Load inference options from CLI options and config file
 *
 * @param cliOptions - CLI flags
 * @param configFile - Optional `inference` section of a config file
 * @returns Merged options with defaults applied
 *
 * @example
 * const options = loadInferenceOptions(
 *   { exampleCap: 3 },
 *   { exampleCap: 10, minKeyGroupSize: 2 }
 * );
 * // Returns: exampleCap 3 (CLI takes precedence), minKeyGroupSize 2
 */
export function loadInferenceOptions(
  cliOptions: InferenceCliOptions = {},
  configFile: InferenceConfigSection = {},
): InferenceOptions {
  // --no-date-keys can only switch abstraction off; the flag's implicit
  // true default must not override a config file that disables it
  const abstractDateKeys =
    cliOptions.dateKeys === false
      ? false
      : configFile.abstractDateKeys ?? DEFAULT_INFERENCE_OPTIONS.abstractDateKeys;

  if (!abstractDateKeys) {
    logger.info("Date key abstraction disabled");
  }

  // Build options with precedence: CLI > config file > defaults
  const options: InferenceOptions = {
    exampleCap:
      cliOptions.exampleCap ??
      configFile.exampleCap ??
      DEFAULT_INFERENCE_OPTIONS.exampleCap,

    abstractDateKeys,

    minKeyGroupSize:
      cliOptions.minKeyGroup ??
      configFile.minKeyGroupSize ??
      DEFAULT_INFERENCE_OPTIONS.minKeyGroupSize,

    placeholderTemplate:
      cliOptions.placeholderTemplate ??
      configFile.placeholderTemplate ??
      DEFAULT_INFERENCE_OPTIONS.placeholderTemplate,

    maxArrayItems:
      cliOptions.sampleSize ??
      configFile.maxArrayItems ??
      DEFAULT_INFERENCE_OPTIONS.maxArrayItems,
  };

  validateInferenceOptions(options);

  logger.debug("Inference options loaded", { ...options });

  return options;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * Validate inference options
 *
 * @throws ConfigError if options are invalid
 */
export function validateInferenceOptions(options: InferenceOptions): void {
  if (!Number.isInteger(options.exampleCap) || options.exampleCap < 0) {
    throw new ConfigError(
      `exampleCap must be a non-negative integer, got ${options.exampleCap}`,
      { exampleCap: options.exampleCap },
    );
  }

  if (!isPositiveInteger(options.minKeyGroupSize)) {
    throw new ConfigError(
      `minKeyGroupSize must be an integer >= 1, got ${options.minKeyGroupSize}`,
      { minKeyGroupSize: options.minKeyGroupSize },
    );
  }

  if (
    options.maxArrayItems !== undefined &&
    !isPositiveInteger(options.maxArrayItems)
  ) {
    throw new ConfigError(
      `maxArrayItems must be an integer >= 1, got ${options.maxArrayItems}`,
      { maxArrayItems: options.maxArrayItems },
    );
  }

  // Without {depth} placeholders from different nesting levels would collide
  for (const token of ["{pattern}", "{depth}"]) {
    if (!options.placeholderTemplate.includes(token)) {
      throw new ConfigError(
        `placeholderTemplate must contain ${token}, got "${options.placeholderTemplate}"`,
        { placeholderTemplate: options.placeholderTemplate },
      );
    }
  }
}
