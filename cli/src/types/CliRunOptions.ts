/**
 * CLI Run Command Options
 *
 * Options for `gridplan run`, as commander hands them to the action.
 */

import type { LogLevel } from '@gridplan/engine';
import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliRunOptions {
  /**
   * Scenario text the plan is run for
   */
  scenario: string;

  /**
   * Plan inputs from repeated `--input key=value`
   */
  input: Record<string, unknown>;

  /**
   * YAML or JSON file with more plan inputs; `--input` wins on conflicts
   */
  inputsFile?: string;

  /**
   * Fixture file answering tool, retrieval and agent calls
   */
  fixtures?: string;

  /**
   * Strategy name; the classifier's recommendation when absent
   */
  strategy?: string;

  /**
   * Per-call facade timeout in milliseconds
   */
  timeout?: number;

  format: FormatterType;

  logLevel: LogLevel;

  verbose?: boolean;

  silent?: boolean;

  /**
   * `false` under `--no-color`
   */
  color: boolean;
}
