/**
 * Error Formatter
 *
 * Renders engine errors for terminal display.
 *
 * ```typescript
 * process.stderr.write(formatError(error, { colors: true }) + '\n');
 * ```
 *
 * @module errors
 */

import { Chalk } from 'chalk';
import { PlanEngineError } from './PlanEngineError.js';
import { ErrorSeverity } from './ErrorCodes.js';

export interface ErrorFormatOptions {
  /** ANSI colors (default: false) */
  colors?: boolean;
  /** Show exit code, category, flags and context (default: false) */
  verbose?: boolean;
}

/**
 * Format an engine error for CLI display
 */
export function formatError(error: PlanEngineError, options: ErrorFormatOptions = {}): string {
  const c = new Chalk({ level: options.colors ? 1 : 0 });
  const headline = error.severity === ErrorSeverity.WARNING ? c.yellow : c.red;
  const lines: string[] = [];

  lines.push(`${headline(`✖ ${error.name}`)} ${c.gray(`[${error.code}]`)}`);

  if (error.path) {
    lines.push(c.dim(`at ${error.path}`));
  }

  lines.push('', c.bold(error.message));

  if (error.hint) {
    lines.push('', `${c.blue('→ Hint:')} ${error.hint}`);
  }

  if (options.verbose) {
    lines.push('');
    lines.push(`${c.dim('Exit Code:')} ${error.exitCode}`);
    lines.push(`${c.dim('Category:')} ${error.category}`);

    const flags: string[] = [];
    if (error.isUserError) flags.push('User-fixable');
    if (error.isRetryable) flags.push('Retryable');
    if (flags.length > 0) {
      lines.push(`${c.dim('Flags:')} ${flags.join(', ')}`);
    }

    if (error.context && Object.keys(error.context).length > 0) {
      lines.push('', c.dim('Context:'), c.gray(JSON.stringify(error.context, null, 2)));
    }
  }

  return lines.join('\n');
}

/**
 * Format anything thrown; non-engine errors get a plain one-line rendering
 */
export function formatUnknownError(error: unknown, options: ErrorFormatOptions = {}): string {
  if (error instanceof PlanEngineError) {
    return formatError(error, options);
  }
  const c = new Chalk({ level: options.colors ? 1 : 0 });
  const message = error instanceof Error ? error.message : String(error);
  return `${c.red('✖ Error')} ${message}`;
}
