/**
 * CLI configuration types
 */

import type { InferenceConfigSection } from "../../utils/config-loader.js";
import type { OutputFormat } from "../../lib/emitter/types.js";

/**
 * Schema output configuration
 */
export interface OutputConfig {
  format?: OutputFormat;
  indent?: number;
}

/**
 * Type declaration configuration
 */
export interface TypesConfig {
  rootName?: string;
}

/**
 * Complete configuration file structure
 */
export interface JsonSleuthConfig {
  inference?: InferenceConfigSection;
  output?: OutputConfig;
  types?: TypesConfig;
}

/**
 * Options shared by every command (from commander)
 */
export interface CommonCommandOptions {
  exampleCap?: number;
  sampleSize?: number;
  minKeyGroup?: number;
  dateKeys?: boolean;
  output?: string;
  config?: string;
  logLevel?: string;
}

export interface InferCommandOptions extends CommonCommandOptions {
  format?: string;
}

export interface TypesCommandOptions extends CommonCommandOptions {
  rootName?: string;
}
