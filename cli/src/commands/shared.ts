import { InvalidArgumentError, Option } from 'commander';
import { TimeoutManager, errorMessage } from '@gridplan/engine';
import type { FormatterOptions } from '../formatters/Formatter.js';
import { FORMATTER_TYPES } from '../formatters/createFormatter.js';

export function formatOption(): Option {
  return new Option('-f, --format <format>', 'Output format').choices(FORMATTER_TYPES).default('human');
}

export function toFormatterOptions(options: { verbose?: boolean; silent?: boolean; color: boolean }): FormatterOptions {
  return { verbose: options.verbose, silent: options.silent, noColor: !options.color };
}

/**
 * commander parser for durations: "500ms", "30s", "2m" or bare milliseconds
 */
export function parseDuration(value: string): number {
  let ms: number;
  try {
    ms = Math.round(TimeoutManager.parseTimeout(value));
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
  if (ms <= 0) {
    throw new InvalidArgumentError(`Expected a positive duration, got "${value}".`);
  }
  return ms;
}
