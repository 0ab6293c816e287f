/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON): engine events as they happen, then
 * the command's result. Errors go to stderr.
 */

import { PlanEngineError, type ComplexityAnalysis, type ExecutionEvents, type ExecutionResult, type Plan } from '@gridplan/engine';
import type { CliIO } from '../utils/io.js';
import type { Formatter, FormatterOptions } from './Formatter.js';

export class JsonFormatter implements Formatter {
  constructor(
    private readonly options: FormatterOptions,
    private readonly io: CliIO
  ) {}

  attach(events: ExecutionEvents): () => void {
    if (this.options.silent) {
      return () => {};
    }
    return events.onAny((event) => {
      this.write({
        type: event.type,
        timestamp: new Date(event.timestamp).toISOString(),
        executionId: event.executionId,
        planId: event.planId,
        ...event.payload,
      });
    });
  }

  showValidation(file: string, plan: Plan): void {
    this.write({
      type: 'validation',
      valid: true,
      file,
      planId: plan.planId,
      version: plan.version,
      steps: plan.steps.length,
    });
  }

  showAnalysis(analysis: ComplexityAnalysis): void {
    this.write({ type: 'analysis', ...analysis });
  }

  showResult(result: ExecutionResult): void {
    this.write({ type: 'result', ...result });
  }

  showError(error: unknown): void {
    const detail =
      error instanceof PlanEngineError
        ? error.toJSON()
        : { name: error instanceof Error ? error.name : 'Error', message: error instanceof Error ? error.message : String(error) };
    this.io.err(JSON.stringify({ type: 'error', error: detail }));
  }

  showWarning(message: string): void {
    this.write({ type: 'warning', message });
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      this.write({ type: 'info', message });
    }
  }

  private write(value: Record<string, unknown>): void {
    this.io.out(JSON.stringify(value, null, this.options.verbose ? 2 : undefined));
  }
}
