import { fileURLToPath } from 'node:url';
import type { CliIO } from '../../utils/io.js';

export interface CapturedIO extends CliIO {
  stdout: string[];
  stderr: string[];
  logs: string[];
  exitCodes: number[];
}

export function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const logs: string[] = [];
  const exitCodes: number[] = [];
  return {
    stdout,
    stderr,
    logs,
    exitCodes,
    out: (line) => {
      stdout.push(line);
    },
    err: (line) => {
      stderr.push(line);
    },
    exit: (code) => {
      exitCodes.push(code);
    },
    logSink: (line) => {
      logs.push(line);
    },
  };
}

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./${name}`, import.meta.url));
}
