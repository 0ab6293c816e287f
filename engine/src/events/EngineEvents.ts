/**
 * Event types and payloads for plan executions
 *
 * Events are emitted at lifecycle moments of a run and consumed by
 * progress output (the CLI), logging and tests.
 */

import type { RecordKind } from '../types/execution-types.js';

export enum EngineEventType {
  EXECUTION_STARTED = 'execution.started',
  STEP_STARTED = 'step.started',
  STEP_COMPLETED = 'step.completed',
  STEP_FAILED = 'step.failed',
  EXECUTION_COMPLETED = 'execution.completed',
  EXECUTION_FAILED = 'execution.failed',
  EXECUTION_CANCELLED = 'execution.cancelled',
}

export interface EventPayloads {
  [EngineEventType.EXECUTION_STARTED]: {
    strategy: string;
    scenario: string;
    stepCount: number;
  };
  [EngineEventType.STEP_STARTED]: {
    stepId: string;
    kind: RecordKind;
    /** Zero-based position in the plan */
    index: number;
  };
  [EngineEventType.STEP_COMPLETED]: {
    stepId: string;
    kind: RecordKind;
    durationMs: number;
    outputs: Readonly<Record<string, unknown>>;
  };
  [EngineEventType.STEP_FAILED]: {
    stepId: string;
    kind: RecordKind;
    durationMs: number;
    error: string;
    errorCode?: string;
  };
  [EngineEventType.EXECUTION_COMPLETED]: {
    executionTime: number;
    finalOutputs: Readonly<Record<string, unknown>>;
  };
  [EngineEventType.EXECUTION_FAILED]: {
    executionTime: number;
    error: string;
    failedStep?: string;
    errorCode?: string;
  };
  [EngineEventType.EXECUTION_CANCELLED]: {
    executionTime: number;
    beforeStep?: string;
  };
}

/**
 * Event envelope
 */
export interface EngineEvent<E extends EngineEventType = EngineEventType> {
  type: E;
  /** ms since epoch */
  timestamp: number;
  executionId: string;
  planId: string;
  payload: EventPayloads[E];
}

export type EventListener<E extends EngineEventType> = (event: EngineEvent<E>) => void;

export type WildcardListener = (event: EngineEvent) => void;
