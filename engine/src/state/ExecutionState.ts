/**
 * Execution State
 *
 * Mutable per-run state and the tracker that owns it. The tracker is
 * the only writer: it keeps `status` in step with the state machine,
 * appends history records and produces the immutable ExecutionResult.
 *
 * @module state
 */

import { randomUUID } from 'node:crypto';
import { PlanEngineError, errorMessage } from '../errors/PlanEngineError.js';
import { VariableTable } from '../context/VariableTable.js';
import {
  ExecutionStatus,
  type ExecutionRequest,
  type ExecutionResult,
  type RecordKind,
  type StepRecord,
} from '../types/execution-types.js';
import type { Plan } from '../types/plan-types.js';
import { createExecutionStateMachine, type StateMachine } from './StateMachine.js';

export interface ExecutionState {
  readonly planId: string;
  readonly executionId: string;
  readonly scenario: string;
  readonly inputs: Readonly<Record<string, unknown>>;
  readonly variables: VariableTable;
  currentStep?: string;
  status: ExecutionStatus;
  readonly stepHistory: StepRecord[];
  errorMessage?: string;
  failedStep?: string;
  errorCode?: string;
  finalOutputs: Record<string, unknown>;
}

/**
 * What a history record is written for: a plan step, or the delegated
 * strategy's single agent call
 */
export interface RecordTarget {
  readonly stepId: string;
  readonly kind: RecordKind;
  readonly description: string;
}

/**
 * `<planId>_<8 hex chars>`
 */
export function generateExecutionId(planId: string): string {
  return `${planId}_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

export class ExecutionTracker {
  readonly state: ExecutionState;
  private readonly machine: StateMachine<ExecutionStatus> = createExecutionStateMachine();
  private readonly startedAt = performance.now();

  constructor(
    plan: Plan,
    request: ExecutionRequest,
    readonly strategy: string
  ) {
    this.state = {
      planId: plan.planId,
      executionId: generateExecutionId(plan.planId),
      scenario: request.scenario,
      inputs: { ...request.inputs },
      variables: new VariableTable(request.inputs),
      status: ExecutionStatus.PENDING,
      stepHistory: [],
      finalOutputs: {},
    };
  }

  get executionId(): string {
    return this.state.executionId;
  }

  get status(): ExecutionStatus {
    return this.state.status;
  }

  get isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  start(): void {
    this.transition(ExecutionStatus.RUNNING, 'started');
  }

  enterStep(stepId: string): void {
    this.state.currentStep = stepId;
  }

  recordSuccess(target: RecordTarget, outputs: Readonly<Record<string, unknown>>, durationMs: number): void {
    this.state.stepHistory.push({
      stepId: target.stepId,
      kind: target.kind,
      description: target.description,
      success: true,
      outputs: { ...outputs },
      timestamp: new Date().toISOString(),
      durationMs,
    });
  }

  /**
   * Record a failed step and end the run in `failed`
   */
  recordFailure(target: RecordTarget, error: unknown, durationMs: number): void {
    const message = errorMessage(error);
    const errorCode = error instanceof PlanEngineError ? error.code : undefined;

    this.state.stepHistory.push({
      stepId: target.stepId,
      kind: target.kind,
      description: target.description,
      success: false,
      error: message,
      errorCode,
      timestamp: new Date().toISOString(),
      durationMs,
    });

    this.state.errorMessage = message;
    this.state.failedStep = target.stepId;
    this.state.errorCode = errorCode;
    this.transition(ExecutionStatus.FAILED, message);
  }

  /**
   * End the run in `cancelled`. No history record is written.
   */
  cancel(error: PlanEngineError): void {
    this.state.errorMessage = error.message;
    this.state.errorCode = error.code;
    this.transition(ExecutionStatus.CANCELLED, error.message);
  }

  complete(finalOutputs: Readonly<Record<string, unknown>>): void {
    this.state.finalOutputs = { ...finalOutputs };
    this.state.currentStep = undefined;
    this.transition(ExecutionStatus.COMPLETED, 'all steps completed');
  }

  /**
   * Seconds since the tracker was created
   */
  elapsedSeconds(): number {
    return (performance.now() - this.startedAt) / 1000;
  }

  /**
   * Immutable snapshot of the run
   */
  toResult(): ExecutionResult {
    const { state } = this;
    return Object.freeze({
      executionId: state.executionId,
      planId: state.planId,
      success: state.status === ExecutionStatus.COMPLETED,
      status: state.status,
      strategy: this.strategy,
      scenario: state.scenario,
      finalOutputs: Object.freeze({ ...state.finalOutputs }),
      variables: Object.freeze(state.variables.snapshot()),
      stepHistory: Object.freeze(state.stepHistory.map((record) => Object.freeze({ ...record }))),
      executionTime: this.elapsedSeconds(),
      errorMessage: state.errorMessage,
      failedStep: state.failedStep,
      errorCode: state.errorCode,
    });
  }

  private transition(to: ExecutionStatus, reason: string): void {
    this.machine.transition(to, reason);
    this.state.status = to;
  }
}
