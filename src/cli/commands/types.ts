/**
 * Types command - generate TypeScript declarations from an inferred schema
 */

import { Command } from "commander";
import type { TypesCommandOptions } from "../config/types.js";
import {
  exitWithError,
  inferFile,
  parseIntegerOption,
  resolveCommandContext,
  writeTextArtifact,
} from "./shared.js";
import { generateTypeDeclarations } from "../../lib/emitter/index.js";
import { ConfigError } from "../../utils/errors.js";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export interface TypesRunResult {
  rootName: string;
  declarations: string;
  outputPath?: string;
}

/**
 * Run inference for one file and render TypeScript declarations
 */
export async function runTypes(
  filePath: string,
  options: TypesCommandOptions,
): Promise<TypesRunResult> {
  const { config, inference } = resolveCommandContext(options);
  const rootName = options.rootName ?? config.types?.rootName ?? "Root";

  if (!IDENTIFIER.test(rootName)) {
    throw new ConfigError(`Root name must be a valid identifier, got "${rootName}"`, {
      rootName,
    });
  }

  const { schema } = await inferFile(filePath, inference);
  const declarations = generateTypeDeclarations(schema, { rootName });

  const outputPath = options.output
    ? writeTextArtifact(options.output, declarations)
    : undefined;

  return { rootName, declarations, outputPath };
}

/**
 * Execute types command
 */
async function executeTypes(
  filePath: string,
  options: TypesCommandOptions,
): Promise<void> {
  try {
    const result = await runTypes(filePath, options);

    if (result.outputPath) {
      console.log(
        JSON.stringify(
          {
            status: "success",
            phase: "types",
            artifacts: { declarations: result.outputPath },
            summary: { rootName: result.rootName },
          },
          null,
          2,
        ),
      );
    } else {
      process.stdout.write(result.declarations);
    }
  } catch (error) {
    exitWithError(error, "types");
  }
}

/**
 * Create types command
 */
export function createTypesCommand(): Command {
  const command = new Command("types");

  command
    .description("Generate TypeScript interfaces from the inferred schema of a JSON document")
    .argument("<file>", "Path to the JSON document")
    .option("--root-name <name>", "Name of the root declaration (default: Root)")
    .option("--output <path>", "Write declarations to a file instead of stdout")
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
    .action(executeTypes);

  return command;
}
