/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { Ajv } from "ajv";
import type { JsonSleuthConfig } from "./types.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<JsonSleuthConfig>(CONFIG_FILE_SCHEMA);

/**
 * Check parsed configuration content against the config file schema
 *
 * @throws ConfigError listing every violation
 */
export function validateConfigContent(
  content: unknown,
  filePath: string,
): JsonSleuthConfig {
  // An empty YAML file parses to null
  const config = content ?? {};

  if (!validateConfig(config)) {
    const violations = (validateConfig.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(
      `Invalid config file ${filePath}: ${violations.join("; ")}`,
      { filePath, violations },
    );
  }

  return config;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): JsonSleuthConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = validateConfigContent(parsed, filePath);

  logger.info("Configuration file parsed successfully", {
    hasInferenceConfig: !!config.inference,
    hasOutputConfig: !!config.output,
    hasTypesConfig: !!config.types,
  });

  return config;
}
