/**
 * CLI Validate and Classify Command Options
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliValidateOptions {
  format: FormatterType;

  /**
   * Show plan details: version, steps, tags
   */
  verbose?: boolean;

  /**
   * Only errors
   */
  silent?: boolean;

  /**
   * `false` under `--no-color`
   */
  color: boolean;
}

export type CliClassifyOptions = Omit<CliValidateOptions, 'silent'>;
