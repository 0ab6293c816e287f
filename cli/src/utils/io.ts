import type { LogSink } from '@gridplan/engine';

/**
 * Where the CLI writes. Commands never touch process streams or the
 * exit code directly, so tests can capture both.
 */
export interface CliIO {
  /** Results: one line to stdout */
  out(line: string): void;
  /** Diagnostics: one line to stderr */
  err(line: string): void;
  /** Record the process exit code */
  exit(code: number): void;
  /** Engine log lines; stderr when absent */
  logSink?: LogSink;
}

export const processIO: CliIO = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
  exit: (code) => {
    process.exitCode = code;
  },
};
