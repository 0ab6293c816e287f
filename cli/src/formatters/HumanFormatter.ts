/**
 * Human-Readable Formatter
 *
 * Symbols:
 * - ▶ Run started
 * - ● Step running
 * - ✔ Success
 * - ✖ Failure
 * - ⊘ Cancelled
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  EngineEventType,
  ExecutionStatus,
  StepKind,
  formatUnknownError,
  formatValue,
  type ComplexityAnalysis,
  type ExecutionEvents,
  type ExecutionResult,
  type Plan,
} from '@gridplan/engine';
import type { CliIO } from '../utils/io.js';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { formatMs, formatSeconds } from './format.js';

export class HumanFormatter implements Formatter {
  private readonly c: ChalkInstance;

  constructor(
    private readonly options: FormatterOptions,
    private readonly io: CliIO
  ) {
    this.c = new Chalk(options.noColor ? { level: 0 } : undefined);
  }

  attach(events: ExecutionEvents): () => void {
    if (this.options.silent) {
      return () => {};
    }

    const { c, io } = this;
    const unsubscribers = [
      events.on(EngineEventType.EXECUTION_STARTED, ({ planId, payload }) => {
        const steps = `${payload.stepCount} step${payload.stepCount === 1 ? '' : 's'}`;
        io.out(c.cyan(`▶ ${planId}: ${steps} (${payload.strategy})`));
      }),
      events.on(EngineEventType.STEP_STARTED, ({ payload }) => {
        io.out(`${c.blue('●')} ${payload.stepId} ${c.dim(`[${payload.kind}]`)}`);
      }),
      events.on(EngineEventType.STEP_COMPLETED, ({ payload }) => {
        io.out(`  ${c.green('✔')} ${c.dim(`done in ${formatMs(payload.durationMs)}`)}`);
      }),
      events.on(EngineEventType.STEP_FAILED, ({ payload }) => {
        io.out(`  ${c.red('✖')} ${c.red(payload.error)}`);
      }),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  showValidation(file: string, plan: Plan): void {
    if (this.options.silent) {
      return;
    }

    const { c, io } = this;
    io.out(`${c.green('✔')} Plan is valid: ${file}`);

    if (this.options.verbose) {
      io.out(`  ${plan.planId} v${plan.version}: ${plan.title}`);
      io.out(`  Steps: ${plan.steps.length}`);
      plan.steps.forEach((step, index) => {
        io.out(`    ${index + 1}. ${step.id} ${c.dim(`[${step.kind}]`)}`);
      });
      if (plan.metadata.tags.length > 0) {
        io.out(`  Tags: ${plan.metadata.tags.join(', ')}`);
      }
    }
  }

  showAnalysis(analysis: ComplexityAnalysis): void {
    const { c, io } = this;
    const kinds = analysis.stepKinds;
    const { tier, formulaCount } = analysis.variableComplexity;
    const rows: Array<[string, string]> = [
      ['Plan', analysis.planId],
      ['Level', analysis.level],
      ['Reason', analysis.reason],
      ['Recommended strategy', analysis.recommendedStrategy],
      [
        'Steps',
        `${analysis.stepCount} (retrieve ${kinds[StepKind.RETRIEVE]}, tool ${kinds[StepKind.TOOL]}, compute ${kinds[StepKind.COMPUTE]})`,
      ],
      ['Conditional logic', analysis.hasConditions ? 'yes' : 'no'],
      ['Step dependencies', analysis.hasDependencies ? 'yes' : 'no'],
      ['Variable formulas', `${tier} (${formulaCount} with formulas)`],
      ['Domains', analysis.domains.length > 0 ? analysis.domains.join(', ') : 'none'],
    ];
    for (const [label, value] of rows) {
      io.out(`${c.bold(`${label}:`)} ${value}`);
    }
  }

  showResult(result: ExecutionResult): void {
    const { c, io } = this;

    switch (result.status) {
      case ExecutionStatus.COMPLETED:
        io.out(
          c.green.bold(`✔ Plan ${result.planId} completed with ${result.strategy} in ${formatSeconds(result.executionTime)}`)
        );
        break;
      case ExecutionStatus.CANCELLED:
        io.out(c.yellow.bold(`⊘ Plan ${result.planId} was cancelled: ${result.errorMessage ?? 'no reason given'}`));
        break;
      default:
        io.out(
          c.red.bold(
            `✖ Plan ${result.planId} failed at step "${result.failedStep ?? 'unknown'}": ${result.errorMessage ?? 'unknown error'}`
          )
        );
    }

    const outputs = Object.entries(result.finalOutputs);
    if (outputs.length > 0) {
      io.out(c.bold('Outputs:'));
      for (const [symbol, value] of outputs) {
        io.out(`  ${symbol} = ${formatValue(value)}`);
      }
    }

    if (this.options.verbose && result.stepHistory.length > 0) {
      io.out(c.bold('Steps:'));
      for (const record of result.stepHistory) {
        io.out(
          record.success
            ? `  ${c.green('✔')} ${record.stepId} [${record.kind}] ${formatMs(record.durationMs)}`
            : `  ${c.red('✖')} ${record.stepId} [${record.kind}]: ${record.error}`
        );
      }
    }
  }

  showError(error: unknown): void {
    this.io.err(formatUnknownError(error, { colors: !this.options.noColor, verbose: this.options.verbose }));
  }

  showWarning(message: string): void {
    if (!this.options.silent) {
      this.io.err(`${this.c.yellow('⚠')} ${message}`);
    }
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      this.io.out(`${this.c.blue('ℹ')} ${message}`);
    }
  }
}
