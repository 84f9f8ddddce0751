/**
 * Helpers shared by CLI commands
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import type { CommonCommandOptions, JsonSleuthConfig } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import type { InferenceOptions } from "../../types/options.js";
import { loadInferenceOptions } from "../../utils/config-loader.js";
import { loadJsonDocument } from "../../lib/loader/index.js";
import { Inferencer, type InferencerResult } from "../../lib/inferencer/index.js";
import {
  ConfigError,
  ErrorCode,
  FileIOError,
  toJsonSleuthError,
} from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";

export interface CommandContext {
  config: JsonSleuthConfig;
  inference: InferenceOptions;
}

/**
 * Apply the log level and resolve configuration for a command run
 */
export function resolveCommandContext(
  options: CommonCommandOptions,
): CommandContext {
  if (options.logLevel !== undefined) {
    applyLogLevel(options.logLevel);
  }

  const config = options.config ? parseConfigFile(options.config) : {};
  const inference = loadInferenceOptions(
    {
      exampleCap: options.exampleCap,
      sampleSize: options.sampleSize,
      minKeyGroup: options.minKeyGroup,
      dateKeys: options.dateKeys,
    },
    config.inference,
  );

  return { config, inference };
}

export function applyLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Invalid log level: ${level}. Must be one of error, warn, info, debug`,
      { logLevel: level },
    );
  }
  logger.setLevel(level);
}

/**
 * Load a document and infer its schema
 */
export async function inferFile(
  filePath: string,
  inference: InferenceOptions,
): Promise<InferencerResult> {
  const document = await loadJsonDocument(filePath);
  const result = new Inferencer(inference).infer(document);

  logger.info("Schema inferred", {
    filePath,
    fieldsDiscovered: result.metadata.fieldsDiscovered,
    placeholdersCreated: result.metadata.placeholdersCreated,
  });

  return result;
}

/**
 * Write a text artifact, creating parent directories
 *
 * @returns Absolute path written
 */
export function writeTextArtifact(path: string, content: string): string {
  const absolutePath = resolve(path);
  try {
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, content, "utf-8");
  } catch (error) {
    throw new FileIOError(
      `Failed to write output to ${absolutePath}`,
      { path: absolutePath },
      { cause: error },
    );
  }
  logger.info("Wrote output", { path: absolutePath });
  return absolutePath;
}

/**
 * Exit code for a failure: 2 for configuration problems, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  return toJsonSleuthError(error).code === ErrorCode.CONFIG_ERROR ? 2 : 1;
}

/**
 * Report a failed command as JSON on stderr and exit
 */
export function exitWithError(error: unknown, phase: string): never {
  const sleuthError = toJsonSleuthError(error);
  console.error(JSON.stringify(sleuthError.toResponse(phase), null, 2));
  process.exit(exitCodeFor(sleuthError));
}

/**
 * Parse an integer option value
 */
export function parseIntegerOption(value: string): number {
  return parseInt(value, 10);
}
