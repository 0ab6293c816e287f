/**
 * Run Command
 *
 * Loads a plan and runs it for a scenario. Tool, retrieval and agent calls
 * are answered from a fixture file, so a plan can be exercised end to end
 * without live services.
 *
 * Usage:
 *   gridplan run plans/dc-limit.yaml --scenario "LineB tripped" --input line=LineA
 *   gridplan run plans/dc-limit.yaml -s "LineB tripped" --fixtures fixtures.yaml --format json
 *   gridplan run plans/dc-limit.yaml -s "LineB tripped" --strategy delegated
 *   gridplan run plans/dc-limit.yaml -s "LineB tripped" --fixtures fixtures.yaml --timeout 30s
 *
 * Ctrl+C cancels the run before its next step (exit code 130).
 */

import { resolve } from 'node:path';
import { Option, type Command } from 'commander';
import { LogLevel, PlanEngine, PlanLoader, loadConfig } from '@gridplan/engine';
import { StaticFacade } from '@gridplan/engine/testing';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliRunOptions } from '../types/CliRunOptions.js';
import { exitCodeForError, exitCodeForResult } from '../utils/exitCodes.js';
import { collectInput, loadInputsFile } from '../utils/inputs.js';
import { processIO, type CliIO } from '../utils/io.js';
import { createCliLogger } from '../utils/logger.js';
import { formatOption, parseDuration, toFormatterOptions } from './shared.js';

export function registerRunCommand(program: Command, io: CliIO = processIO): void {
  program
    .command('run')
    .description('Run a plan for a scenario')
    .argument('<plan>', 'Plan file (YAML or JSON)')
    .requiredOption('-s, --scenario <text>', 'Scenario the plan is run for')
    .option('-i, --input <key=value>', 'Plan input (repeatable)', collectInput, {})
    .option('--inputs-file <path>', 'Load plan inputs from a YAML or JSON file')
    .option('--fixtures <path>', 'Fixture file answering tool, retrieval and agent calls')
    .option('--strategy <name>', 'Execution strategy (default: classifier recommendation)')
    .option('-t, --timeout <duration>', 'Per-call timeout for tool and retrieval calls (e.g. 500ms, 30s)', parseDuration)
    .addOption(formatOption())
    .addOption(
      new Option('--log-level <level>', 'Engine log level')
        .choices(Object.values(LogLevel))
        .default(LogLevel.WARN)
        .env('GRIDPLAN_LOG_LEVEL')
    )
    .option('--verbose', 'Show step history and error details')
    .option('--silent', 'Only the result and errors')
    .option('--no-color', 'Disable colored output')
    .action(async (file: string, options: CliRunOptions) => {
      io.exit(await runPlan(file, options, io));
    });
}

export async function runPlan(file: string, options: CliRunOptions, io: CliIO = processIO): Promise<number> {
  const formatter = createFormatter(options.format, toFormatterOptions(options), io);

  try {
    const config = loadConfig({
      logLevel: options.logLevel,
      colors: options.color ? undefined : false,
      defaultStrategy: options.strategy,
      facadeTimeoutMs: options.timeout,
    });
    const plan = await PlanLoader.fromFile(resolve(file));
    const inputs = {
      ...(options.inputsFile ? await loadInputsFile(options.inputsFile) : {}),
      ...options.input,
    };
    const facade = options.fixtures ? await StaticFacade.fromFile(options.fixtures) : StaticFacade.fromFixture({});

    const engine = new PlanEngine({
      ...config,
      tools: facade,
      retrieval: facade,
      agent: facade,
      logger: createCliLogger(config, io.logSink),
    });

    const controller = new AbortController();
    const onInterrupt = (): void => {
      formatter.showWarning('Interrupted; cancelling before the next step');
      controller.abort();
    };
    const detach = formatter.attach(engine.events);
    process.once('SIGINT', onInterrupt);

    const result = await engine
      .execute(plan, options.scenario, inputs, { signal: controller.signal })
      .finally(() => {
        process.off('SIGINT', onInterrupt);
        detach();
      });

    formatter.showResult(result);
    return exitCodeForResult(result);
  } catch (error) {
    formatter.showError(error);
    return exitCodeForError(error);
  }
}
