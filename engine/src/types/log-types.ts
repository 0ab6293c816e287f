/**
 * Log levels, ordered by severity.
 * `SILENT` is only meaningful as a threshold.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
  SILENT = 'silent',
}

export const LogLevelSeverity: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50,
  [LogLevel.SILENT]: 100,
};

/**
 * Engine log output format
 * - text: one human-readable line per entry
 * - json: one JSON object per line
 */
export type EngineLogFormat = 'text' | 'json';

/**
 * Receives each formatted line; defaults to stderr
 */
export type LogSink = (line: string, entry: LogEntry) => void;

/**
 * Structured engine log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  /** Component that logged, e.g. 'SequentialStrategy', 'PlanParser' */
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format (default: text) */
  format?: EngineLogFormat;
  /** ANSI colors in text output (default: true) */
  colors?: boolean;
  /** Include timestamps in text output (default: true) */
  timestamp?: boolean;
  /** Source identifier (default: 'GridPlan') */
  source?: string;
  /** Output target (default: stderr) */
  sink?: LogSink;
  /** Entries kept in memory for getLogs() (default: 1000) */
  historyLimit?: number;
}
