/**
 * Infer command - print the inferred schema of a JSON document
 */

import { Command } from "commander";
import type { InferCommandOptions } from "../config/types.js";
import {
  exitWithError,
  inferFile,
  parseIntegerOption,
  resolveCommandContext,
  writeTextArtifact,
} from "./shared.js";
import {
  formatSchemaJson,
  OUTPUT_FORMATS,
  renderSchemaTree,
  type OutputFormat,
} from "../../lib/emitter/index.js";
import type { SchemaSummary } from "../../lib/inferencer/types.js";
import { ConfigError } from "../../utils/errors.js";

export interface InferRunResult {
  format: OutputFormat;
  /** Rendered schema */
  rendered: string;
  /** Absolute path of the written schema when --output was given */
  outputPath?: string;
  summary: SchemaSummary & { durationMs: number };
}

function resolveFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new ConfigError(
      `Unsupported output format: ${value}. Must be one of ${OUTPUT_FORMATS.join(", ")}`,
      { format: value },
    );
  }
  return format;
}

/**
 * Run inference for one file and render the schema
 */
export async function runInfer(
  filePath: string,
  options: InferCommandOptions,
): Promise<InferRunResult> {
  const startTime = Date.now();
  const { config, inference } = resolveCommandContext(options);
  const format = resolveFormat(options.format ?? config.output?.format ?? "json");

  const { schema, metadata } = await inferFile(filePath, inference);
  const rendered =
    format === "tree"
      ? renderSchemaTree(schema)
      : formatSchemaJson(schema, config.output?.indent ?? 2);

  const outputPath = options.output
    ? writeTextArtifact(options.output, rendered + "\n")
    : undefined;

  return {
    format,
    rendered,
    outputPath,
    summary: { ...metadata, durationMs: Date.now() - startTime },
  };
}

/**
 * Execute infer command
 */
async function executeInfer(
  filePath: string,
  options: InferCommandOptions,
): Promise<void> {
  try {
    const result = await runInfer(filePath, options);

    if (result.outputPath) {
      console.log(
        JSON.stringify(
          {
            status: "success",
            phase: "infer",
            artifacts: { schema: result.outputPath },
            summary: result.summary,
          },
          null,
          2,
        ),
      );
    } else {
      process.stdout.write(result.rendered + "\n");
    }
  } catch (error) {
    exitWithError(error, "infer");
  }
}

/**
 * Create infer command
 */
export function createInferCommand(): Command {
  const command = new Command("infer");

  command
    .description(
      "Infer the schema of a JSON document, abstracting date-shaped keys into placeholders",
    )
    .argument("<file>", "Path to the JSON document")
    .option("--format <format>", "Output format: json, tree")
    .option("--output <path>", "Write the schema to a file instead of stdout")
    .option(
      "--example-cap <count>",
      "Examples kept per field (default: 5)",
      parseIntegerOption,
    )
    .option(
      "--sample-size <count>",
      "Sample only the first N elements of each array",
      parseIntegerOption,
    )
    .option(
      "--min-key-group <count>",
      "Smallest group of date-shaped sibling keys to abstract (default: 1)",
      parseIntegerOption,
    )
    .option("--no-date-keys", "Keep date-shaped keys as ordinary properties")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeInfer);

  return command;
}
