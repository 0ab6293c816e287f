/**
 * CLI Logger
 *
 * Configures the process-wide engine logger for a CLI invocation. Engine
 * logs go to stderr so stdout carries only command output.
 *
 * @module utils
 */

import { LoggerManager, type EngineLogger, type LogSink, type ResolvedEngineConfig } from '@gridplan/engine';

export function createCliLogger(
  config: Pick<ResolvedEngineConfig, 'logLevel' | 'logFormat' | 'colors'>,
  sink?: LogSink
): EngineLogger {
  return LoggerManager.initialize({
    level: config.logLevel,
    format: config.logFormat,
    colors: config.colors,
    timestamp: config.logFormat === 'json',
    source: 'gridplan',
    sink,
  });
}
