import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  ExitCodes,
  MissingInputError,
  PlanErrorCode,
  PlanFileNotFoundError,
  SchemaError,
  ToolInvocationError,
  findClosestMatch,
  formatError,
  formatUnknownError,
} from '../index.js';

describe('PlanEngineError', () => {
  it('derives exit code and flags from the error code', () => {
    const error = new MissingInputError('dc_limit', ['line', 'limit']);

    expect(error.code).toBe(PlanErrorCode.VALIDATION_MISSING_INPUT);
    expect(error.exitCode).toBe(ExitCodes.MISSING_REQUIRED_INPUT);
    expect(error.category).toBe('Validation Error');
    expect(error.isUserError).toBe(true);
    expect(error.isRetryable).toBe(false);
    expect(error.message).toBe('Plan "dc_limit" is missing required input(s): line, limit');
    expect(error.name).toBe('MissingInputError');
    expect(error).toBeInstanceOf(Error);
  });

  it('marks facade failures as retryable external errors', () => {
    const error = new ToolInvocationError('dc_power_flow', 'service unavailable');

    expect(error.exitCode).toBe(ExitCodes.EXTERNAL_SERVICE_FAILED);
    expect(error.isRetryable).toBe(true);
    expect(error.isUserError).toBe(false);
    expect(error.message).toBe('Tool "dc_power_flow" failed: service unavailable');
  });

  it('maps parse, missing-file and cancellation errors to their own exit codes', () => {
    expect(SchemaError.parseError('YAML', 'bad indent').exitCode).toBe(ExitCodes.INVALID_FORMAT);
    expect(SchemaError.missingField('plan_id', 'plan').exitCode).toBe(ExitCodes.INVALID_SCHEMA);
    expect(new PlanFileNotFoundError('/tmp/none.yaml').exitCode).toBe(ExitCodes.INVALID_FILE);
    expect(new CancelledError('exec-1', 'step_2').exitCode).toBe(ExitCodes.CANCELLED);
  });

  it('serializes to JSON with its diagnostic fields', () => {
    const json = new CancelledError('exec-1').toJSON();

    expect(json).toMatchObject({
      name: 'CancelledError',
      code: 'GP-E-001',
      exitCode: 130,
      message: 'Execution exec-1 was cancelled',
      category: 'Execution Error',
      isUserError: false,
      isRetryable: false,
      context: { executionId: 'exec-1', beforeStep: undefined },
    });
  });
});

describe('formatError', () => {
  it('renders headline, path, message and hint without colors', () => {
    const text = formatError(new MissingInputError('dc_limit', ['line']));

    expect(text.split('\n')).toEqual([
      '✖ MissingInputError [GP-V-001]',
      'at plan.plan_inputs',
      '',
      'Plan "dc_limit" is missing required input(s): line',
      '',
      '→ Hint: Provide "line"',
    ]);
  });

  it('adds exit code and category in verbose mode', () => {
    const text = formatError(new MissingInputError('dc_limit', ['line']), { verbose: true });

    expect(text).toContain('Exit Code: 107');
    expect(text).toContain('Category: Validation Error');
    expect(text).toContain('Flags: User-fixable');
  });

  it('renders foreign errors on one line', () => {
    expect(formatUnknownError(new Error('boom'))).toBe('✖ Error boom');
    expect(formatUnknownError('plain')).toBe('✖ Error plain');
  });
});

describe('findClosestMatch', () => {
  it('suggests a near miss and ignores distant words', () => {
    expect(findClosestMatch('stepz', ['steps', 'title'])).toBe('steps');
    expect(findClosestMatch('zzzzz', ['steps', 'title'])).toBeUndefined();
  });
});
