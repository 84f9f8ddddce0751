#!/usr/bin/env node

/**
 * jsonsleuth CLI - infer readable schemas from JSON documents
 */

import { Command } from 'commander';
import { createInferCommand } from './commands/infer.js';
import { createTypesCommand } from './commands/types.js';
import { applyLogLevel, exitWithError } from './commands/shared.js';

const pkg = {
  name: 'jsonsleuth',
  version: '0.1.0',
  description: 'Infer a normalized, human-readable schema from arbitrary JSON documents',
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option('--log-level <level>', 'Logging verbosity: error, warn, info, debug');

  // Apply the global log level before any command runs
  program.hook('preAction', (thisCommand) => {
    const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
    if (logLevel) {
      applyLogLevel(logLevel);
    }
  });

  program.addCommand(createInferCommand());
  program.addCommand(createTypesCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  exitWithError(error, 'cli');
});
