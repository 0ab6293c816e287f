/**
 * Base Formatter Interface
 *
 * Formatters are the only place the CLI produces output. Commands hand
 * them results and errors; during a run they observe engine events.
 */

import type { ComplexityAnalysis, ExecutionEvents, ExecutionResult, Plan } from '@gridplan/engine';

export interface FormatterOptions {
  /** More detail: step listings, error context */
  verbose?: boolean;

  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;

  /** Only results and errors; no progress */
  silent?: boolean;
}

export interface Formatter {
  /**
   * Observe a run's events; returns a function that stops observing
   */
  attach(events: ExecutionEvents): () => void;

  showValidation(file: string, plan: Plan): void;

  showAnalysis(analysis: ComplexityAnalysis): void;

  showResult(result: ExecutionResult): void;

  /**
   * Display anything a command caught
   */
  showError(error: unknown): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
