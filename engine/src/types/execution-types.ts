import type { StepKind } from './plan-types.js';

/**
 * Run lifecycle: pending → running → completed | failed | cancelled.
 * Terminal states are sticky.
 */
export enum ExecutionStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * Kind recorded in step history. The delegated strategy records its
 * single agent call as kind `agent`.
 */
export type RecordKind = StepKind | 'agent';

interface StepRecordBase {
  readonly stepId: string;
  readonly kind: RecordKind;
  readonly description: string;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly durationMs: number;
}

export interface StepSuccessRecord extends StepRecordBase {
  readonly success: true;
  /** Symbols bound by this step and their values */
  readonly outputs: Readonly<Record<string, unknown>>;
}

export interface StepFailureRecord extends StepRecordBase {
  readonly success: false;
  readonly error: string;
  readonly errorCode?: string;
}

export type StepRecord = StepSuccessRecord | StepFailureRecord;

/**
 * Immutable outcome of one execution
 */
export interface ExecutionResult {
  readonly executionId: string;
  readonly planId: string;
  readonly success: boolean;
  /** Terminal status; distinguishes cancelled from failed */
  readonly status: ExecutionStatus;
  /** Name of the strategy that ran */
  readonly strategy: string;
  readonly scenario: string;
  readonly finalOutputs: Readonly<Record<string, unknown>>;
  readonly variables: Readonly<Record<string, unknown>>;
  readonly stepHistory: readonly StepRecord[];
  /** Wall time in seconds */
  readonly executionTime: number;
  readonly errorMessage?: string;
  readonly failedStep?: string;
  readonly errorCode?: string;
}

/**
 * Per-call execution options
 */
export interface ExecuteOptions {
  /** Strategy name; overrides the classifier's recommendation */
  strategy?: string;
  /** Cooperative cancellation, checked between steps */
  signal?: AbortSignal;
}

/**
 * What a strategy receives for one run
 */
export interface ExecutionRequest {
  readonly scenario: string;
  readonly inputs: Readonly<Record<string, unknown>>;
  readonly signal?: AbortSignal;
}
