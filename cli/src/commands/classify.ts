/**
 * Classify Command
 *
 * Shows the complexity analysis of a plan and the strategy it would run
 * with.
 *
 * Usage:
 *   gridplan classify plans/dc-limit.yaml
 *   gridplan classify plans/dc-limit.yaml --format json
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { ComplexityClassifier, ExitCodes, PlanLoader } from '@gridplan/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliClassifyOptions } from '../types/CliValidateOptions.js';
import { exitCodeForError } from '../utils/exitCodes.js';
import { processIO, type CliIO } from '../utils/io.js';
import { formatOption, toFormatterOptions } from './shared.js';

export function registerClassifyCommand(program: Command, io: CliIO = processIO): void {
  program
    .command('classify')
    .description('Show the complexity analysis of a plan')
    .argument('<plan>', 'Plan file (YAML or JSON)')
    .addOption(formatOption())
    .option('--verbose', 'Show error details')
    .option('--no-color', 'Disable colored output')
    .action(async (file: string, options: CliClassifyOptions) => {
      io.exit(await classifyPlan(file, options, io));
    });
}

export async function classifyPlan(file: string, options: CliClassifyOptions, io: CliIO = processIO): Promise<number> {
  const formatter = createFormatter(options.format, toFormatterOptions(options), io);

  try {
    const plan = await PlanLoader.fromFile(resolve(file));
    formatter.showAnalysis(new ComplexityClassifier().classify(plan));
    return ExitCodes.SUCCESS;
  } catch (error) {
    formatter.showError(error);
    return exitCodeForError(error);
  }
}
