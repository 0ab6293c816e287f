import { describe, it, expect } from 'vitest';
import {
  ExecutionStatus,
  ExitCodes,
  MissingInputError,
  PlanFileNotFoundError,
  type ExecutionResult,
} from '@gridplan/engine';
import { exitCodeForError, exitCodeForResult } from '../utils/exitCodes.js';

function resultWith(status: ExecutionStatus): ExecutionResult {
  return {
    executionId: 'exec-1',
    planId: 'dc_limit',
    success: status === ExecutionStatus.COMPLETED,
    status,
    strategy: 'sequential',
    scenario: 'LineB tripped',
    finalOutputs: {},
    variables: {},
    stepHistory: [],
    executionTime: 0,
  };
}

describe('exitCodeForError', () => {
  it('uses the exit code of engine errors', () => {
    expect(exitCodeForError(new MissingInputError('dc_limit', ['line']))).toBe(ExitCodes.MISSING_REQUIRED_INPUT);
    expect(exitCodeForError(new PlanFileNotFoundError('plan.yaml'))).toBe(ExitCodes.INVALID_FILE);
  });

  it('falls back to a general error', () => {
    expect(exitCodeForError(new Error('boom'))).toBe(ExitCodes.GENERAL_ERROR);
    expect(exitCodeForError('boom')).toBe(ExitCodes.GENERAL_ERROR);
  });
});

describe('ExitCodes', () => {
  it('fits every code in a process exit status', () => {
    const codes = Object.values(ExitCodes).filter((value): value is ExitCodes => typeof value === 'number');

    expect(codes.length).toBeGreaterThan(0);
    expect(codes.filter((code) => code < 0 || code > 255)).toEqual([]);
  });
});

describe('exitCodeForResult', () => {
  it('maps terminal statuses', () => {
    expect(exitCodeForResult(resultWith(ExecutionStatus.COMPLETED))).toBe(0);
    expect(exitCodeForResult(resultWith(ExecutionStatus.CANCELLED))).toBe(130);
    expect(exitCodeForResult(resultWith(ExecutionStatus.FAILED))).toBe(200);
  });
});
