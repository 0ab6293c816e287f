/**
 * State Machine
 *
 * Enforces valid state transitions for plan executions.
 *
 * This is about RULES, not execution. It answers:
 * - Can this state transition happen?
 * - What are the valid next states?
 * - Is this state terminal (no further transitions)?
 *
 * @module state
 */

import { InternalEngineError } from '../errors/PlanEngineError.js';
import { ExecutionStatus } from '../types/execution-types.js';

/**
 * State transition record for audit trail
 */
export interface StateTransition<T> {
  readonly from: T;
  readonly to: T;
  /** ms since epoch */
  readonly timestamp: number;
  readonly reason?: string;
}

export interface StateMachineConfig<T> {
  readonly initialState: T;
  /** from → allowed target states */
  readonly transitions: ReadonlyMap<T, readonly T[]>;
  /** No transition leaves these */
  readonly terminalStates: ReadonlySet<T>;
}

/**
 * Generic state machine for enforcing valid transitions
 */
export class StateMachine<T> {
  private currentState: T;
  private readonly config: StateMachineConfig<T>;
  private readonly history: StateTransition<T>[] = [];

  constructor(config: StateMachineConfig<T>) {
    this.config = config;
    this.currentState = config.initialState;
  }

  getState(): T {
    return this.currentState;
  }

  canTransition(to: T): boolean {
    if (this.config.terminalStates.has(this.currentState)) {
      return false;
    }
    return this.config.transitions.get(this.currentState)?.includes(to) ?? false;
  }

  /**
   * Perform state transition
   *
   * @throws InternalEngineError if the transition is not allowed
   */
  transition(to: T, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new InternalEngineError(
        `Invalid state transition: ${String(this.currentState)} → ${String(to)}`,
        { from: this.currentState, to, allowed: [...this.getAllowedTransitions()] }
      );
    }

    const from = this.currentState;
    this.currentState = to;
    this.history.push({ from, to, timestamp: Date.now(), reason });
  }

  isTerminal(): boolean {
    return this.config.terminalStates.has(this.currentState);
  }

  getAllowedTransitions(): readonly T[] {
    if (this.isTerminal()) return [];
    return this.config.transitions.get(this.currentState) ?? [];
  }

  getHistory(): readonly StateTransition<T>[] {
    return [...this.history];
  }
}

/**
 * Execution transitions:
 * PENDING → RUNNING (start)
 * PENDING → CANCELLED (aborted before the first step)
 * RUNNING → COMPLETED (all steps succeeded)
 * RUNNING → FAILED (a step failed)
 * RUNNING → CANCELLED (aborted between steps)
 */
const EXECUTION_TRANSITIONS = new Map<ExecutionStatus, readonly ExecutionStatus[]>([
  [ExecutionStatus.PENDING, [ExecutionStatus.RUNNING, ExecutionStatus.CANCELLED]],
  [ExecutionStatus.RUNNING, [ExecutionStatus.COMPLETED, ExecutionStatus.FAILED, ExecutionStatus.CANCELLED]],
  [ExecutionStatus.COMPLETED, []],
  [ExecutionStatus.FAILED, []],
  [ExecutionStatus.CANCELLED, []],
]);

const EXECUTION_TERMINAL_STATES = new Set<ExecutionStatus>([
  ExecutionStatus.COMPLETED,
  ExecutionStatus.FAILED,
  ExecutionStatus.CANCELLED,
]);

export function createExecutionStateMachine(): StateMachine<ExecutionStatus> {
  return new StateMachine<ExecutionStatus>({
    initialState: ExecutionStatus.PENDING,
    transitions: EXECUTION_TRANSITIONS,
    terminalStates: EXECUTION_TERMINAL_STATES,
  });
}

export function isExecutionTerminal(status: ExecutionStatus): boolean {
  return EXECUTION_TERMINAL_STATES.has(status);
}
