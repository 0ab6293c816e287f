/**
 * Engine Logger
 *
 * Structured logging for the plan engine. Supports text and JSON output,
 * level filtering and an in-memory history that tests and the CLI can
 * inspect.
 *
 * @module logging
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  LogLevel,
  LogLevelSeverity,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';

const DEFAULT_HISTORY_LIMIT = 1000;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

interface ResolvedLoggerConfig {
  level: LogLevel;
  format: EngineLogFormat;
  colors: boolean;
  timestamp: boolean;
  source: string;
  sink: LogSink;
  historyLimit: number;
}

/**
 * Shared between a logger and its children
 */
interface LogHistory {
  entries: LogEntry[];
}

/**
 * Check whether `level` passes the `threshold`
 */
export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  if (level === LogLevel.SILENT) return false;
  return LogLevelSeverity[level] >= LogLevelSeverity[threshold];
}

export class EngineLogger {
  private config: ResolvedLoggerConfig;
  private paint: ChalkInstance;
  private readonly history: LogHistory;

  constructor(config: EngineLoggerConfig, history?: LogHistory) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'GridPlan',
      sink: config.sink ?? stderrSink,
      historyLimit: config.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    };
    this.paint = new Chalk({ level: this.config.colors ? 1 : 0 });
    this.history = history ?? { entries: [] };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  /**
   * Logger for a sub-component. Shares configuration, sink and history;
   * only the source differs.
   */
  child(source: string): EngineLogger {
    return new EngineLogger({ ...this.config, source }, this.history);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      source: this.config.source,
      message,
      context: context && Object.keys(context).length > 0 ? context : undefined,
      error: describeError(error),
    };

    this.remember(entry);
    this.config.sink(this.format(entry), entry);
  }

  private remember(entry: LogEntry): void {
    const { entries } = this.history;
    entries.push(entry);
    if (entries.length > this.config.historyLimit) {
      entries.splice(0, entries.length - this.config.historyLimit);
    }
  }

  /**
   * Render one entry in the configured format
   */
  format(entry: LogEntry): string {
    if (this.config.format === 'json') {
      return JSON.stringify({
        timestamp: entry.timestamp.toISOString(),
        level: entry.level,
        source: entry.source,
        message: entry.message,
        context: entry.context,
        error: entry.error,
      });
    }

    const c = this.paint;
    const parts: string[] = [];
    if (this.config.timestamp) {
      parts.push(c.gray(entry.timestamp.toISOString()));
    }
    parts.push(this.levelLabel(entry.level));
    parts.push(c.cyan(`[${entry.source}]`));
    parts.push(entry.message);
    if (entry.context) {
      parts.push(c.gray(safeStringify(entry.context)));
    }
    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : '';
      parts.push(c.red(`(${entry.error.name}${code}: ${entry.error.message})`));
    }
    return parts.join(' ');
  }

  private levelLabel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    const c = this.paint;
    switch (level) {
      case LogLevel.DEBUG:
        return c.gray(label);
      case LogLevel.INFO:
        return c.blue(label);
      case LogLevel.WARN:
        return c.yellow(label);
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        return c.red.bold(label);
      default:
        return label;
    }
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.colors = enabled;
    this.paint = new Chalk({ level: enabled ? 1 : 0 });
  }

  setFormat(format: EngineLogFormat): void {
    this.config.format = format;
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  /**
   * Entries recorded so far (shared with children), oldest first
   */
  getLogs(): readonly LogEntry[] {
    return [...this.history.entries];
  }

  clearLogs(): void {
    this.history.entries.length = 0;
  }

  getConfig(): Readonly<Omit<ResolvedLoggerConfig, 'sink'>> {
    const { sink: _sink, ...rest } = this.config;
    return rest;
  }
}

/**
 * Map a level name (as found in config or on the command line) to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const normalized = name.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

/**
 * Create a logger from engine-level settings
 */
export function createEngineLogger(
  level: LogLevel,
  options: Omit<EngineLoggerConfig, 'level'> = {}
): EngineLogger {
  return new EngineLogger({ ...options, level });
}

function describeError(error: unknown): LogEntry['error'] {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, code };
  }
  return { name: 'Error', message: String(error) };
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '[unserializable]';
  }
}
