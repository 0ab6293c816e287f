/**
 * Validate Command
 *
 * Loads one or more plan files and checks them against the plan schema
 * without running anything.
 *
 * Usage:
 *   gridplan validate plans/dc-limit.yaml
 *   gridplan validate plans/*.yaml --verbose
 *
 * Exit codes:
 *   0 - All plans valid
 *   otherwise the exit code of the first failure (103 invalid schema, 110 unreadable file, ...)
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { ExitCodes, PlanLoader } from '@gridplan/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import { exitCodeForError } from '../utils/exitCodes.js';
import { processIO, type CliIO } from '../utils/io.js';
import { formatOption, toFormatterOptions } from './shared.js';

export function registerValidateCommand(program: Command, io: CliIO = processIO): void {
  program
    .command('validate')
    .description('Validate plan files without running them')
    .argument('<plans...>', 'Plan files (YAML or JSON)')
    .addOption(formatOption())
    .option('--verbose', 'Show plan details')
    .option('--silent', 'Only report errors')
    .option('--no-color', 'Disable colored output')
    .action(async (files: string[], options: CliValidateOptions) => {
      io.exit(await validatePlans(files, options, io));
    });
}

/**
 * Every file is checked even after a failure
 */
export async function validatePlans(
  files: readonly string[],
  options: CliValidateOptions,
  io: CliIO = processIO
): Promise<number> {
  const formatter = createFormatter(options.format, toFormatterOptions(options), io);
  let exitCode: number = ExitCodes.SUCCESS;

  for (const file of files) {
    try {
      const plan = await PlanLoader.fromFile(resolve(file));
      formatter.showValidation(file, plan);
    } catch (error) {
      formatter.showError(error);
      if (exitCode === ExitCodes.SUCCESS) {
        exitCode = exitCodeForError(error);
      }
    }
  }

  return exitCode;
}
