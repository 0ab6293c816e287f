/**
 * Formatter Factory
 *
 * The single point where formatters are instantiated.
 */

import { processIO, type CliIO } from '../utils/io.js';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';

export const FORMATTER_TYPES = ['human', 'json'] as const;

export type FormatterType = (typeof FORMATTER_TYPES)[number];

export function isFormatterType(value: string): value is FormatterType {
  return FORMATTER_TYPES.some((type) => type === value);
}

/**
 * @example
 * ```ts
 * const formatter = createFormatter('json', { verbose: true });
 * formatter.showAnalysis(engine.classify(plan));
 * ```
 */
export function createFormatter(
  type: FormatterType = 'human',
  options: FormatterOptions = {},
  io: CliIO = processIO
): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options, io);
    case 'json':
      return new JsonFormatter(options, io);
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(`Unhandled formatter type: ${String(exhaustiveCheck)}`);
    }
  }
}
