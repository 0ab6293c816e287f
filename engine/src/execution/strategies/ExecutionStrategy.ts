/**
 * Execution strategies
 *
 * A strategy runs one plan for one request and always settles to an
 * ExecutionResult. Caller mistakes (missing inputs) are thrown before
 * anything runs; everything that goes wrong afterwards is recorded in
 * the result.
 *
 * @module execution
 */

import type { PlanEngineError } from '../../errors/PlanEngineError.js';
import { MissingInputError } from '../../errors/ValidationErrors.js';
import { EngineEventType } from '../../events/EngineEvents.js';
import type { EventOrigin, ExecutionEvents } from '../../events/ExecutionEvents.js';
import type { EngineLogger } from '../../logging/EngineLogger.js';
import { ExecutionTracker, type RecordTarget } from '../../state/ExecutionState.js';
import type { ExecutionRequest, ExecutionResult } from '../../types/execution-types.js';
import type { Plan } from '../../types/plan-types.js';

export interface ExecutionStrategy {
  readonly name: string;
  execute(plan: Plan, request: ExecutionRequest): Promise<ExecutionResult>;
}

export interface StrategyDependencies {
  logger: EngineLogger;
  events: ExecutionEvents;
}

/**
 * One run in progress
 */
export interface StrategyRun {
  readonly plan: Plan;
  readonly tracker: ExecutionTracker;
  readonly origin: EventOrigin;
}

/**
 * Milliseconds since `start` (a performance.now() reading), rounded to µs
 */
export function elapsedMs(start: number): number {
  return Math.round((performance.now() - start) * 1000) / 1000;
}

/**
 * Shared bookkeeping: input validation, lifecycle transitions, history,
 * events and logging. Subclasses decide how the work itself is done.
 */
export abstract class BaseExecutionStrategy implements ExecutionStrategy {
  abstract readonly name: string;

  protected readonly logger: EngineLogger;
  protected readonly events: ExecutionEvents;

  constructor(dependencies: StrategyDependencies) {
    this.logger = dependencies.logger;
    this.events = dependencies.events;
  }

  abstract execute(plan: Plan, request: ExecutionRequest): Promise<ExecutionResult>;

  /**
   * @throws MissingInputError naming every declared input not supplied
   */
  protected validateInputs(plan: Plan, inputs: Readonly<Record<string, unknown>>): void {
    const missing = Object.keys(plan.planInputs).filter((key) => !Object.hasOwn(inputs, key));
    if (missing.length > 0) {
      throw new MissingInputError(plan.planId, missing);
    }
  }

  /**
   * Create the tracker and move it to `running`
   */
  protected begin(plan: Plan, request: ExecutionRequest): StrategyRun {
    const tracker = new ExecutionTracker(plan, request, this.name);
    const origin: EventOrigin = { executionId: tracker.executionId, planId: plan.planId };

    tracker.start();
    this.logger.info('Execution started', { ...origin, strategy: this.name, steps: plan.steps.length });
    this.events.emit(EngineEventType.EXECUTION_STARTED, origin, {
      strategy: this.name,
      scenario: request.scenario,
      stepCount: plan.steps.length,
    });

    return { plan, tracker, origin };
  }

  protected stepStarted(run: StrategyRun, target: RecordTarget, index: number): void {
    run.tracker.enterStep(target.stepId);
    this.logger.debug('Step started', { ...run.origin, stepId: target.stepId, kind: target.kind });
    this.events.emit(EngineEventType.STEP_STARTED, run.origin, {
      stepId: target.stepId,
      kind: target.kind,
      index,
    });
  }

  /**
   * Bind outputs and record the step
   */
  protected stepSucceeded(
    run: StrategyRun,
    target: RecordTarget,
    outputs: Readonly<Record<string, unknown>>,
    durationMs: number
  ): void {
    const { variables } = run.tracker.state;
    for (const [symbol, value] of Object.entries(outputs)) {
      variables.bind(symbol, value);
    }

    run.tracker.recordSuccess(target, outputs, durationMs);
    this.logger.debug('Step completed', { ...run.origin, stepId: target.stepId, durationMs });
    this.events.emit(EngineEventType.STEP_COMPLETED, run.origin, {
      stepId: target.stepId,
      kind: target.kind,
      durationMs,
      outputs,
    });
  }

  /**
   * Record the failed step and end the run in `failed`
   */
  protected fail(run: StrategyRun, target: RecordTarget, error: unknown, durationMs: number): ExecutionResult {
    const { tracker, origin } = run;
    tracker.recordFailure(target, error, durationMs);

    const { errorMessage = 'Unknown error', errorCode } = tracker.state;
    this.logger.error(`Step "${target.stepId}" failed`, error, { ...origin, kind: target.kind });
    this.events.emit(EngineEventType.STEP_FAILED, origin, {
      stepId: target.stepId,
      kind: target.kind,
      durationMs,
      error: errorMessage,
      errorCode,
    });
    this.events.emit(EngineEventType.EXECUTION_FAILED, origin, {
      executionTime: tracker.elapsedSeconds(),
      error: errorMessage,
      failedStep: target.stepId,
      errorCode,
    });
    return tracker.toResult();
  }

  /**
   * End the run in `cancelled`
   */
  protected cancel(run: StrategyRun, error: PlanEngineError, beforeStep?: string): ExecutionResult {
    const { tracker, origin } = run;
    tracker.cancel(error);
    this.logger.warn('Execution cancelled', { ...origin, beforeStep });
    this.events.emit(EngineEventType.EXECUTION_CANCELLED, origin, {
      executionTime: tracker.elapsedSeconds(),
      beforeStep,
    });
    return tracker.toResult();
  }

  /**
   * Copy declared plan outputs from the variable table and end the run
   * in `completed`. Outputs no step bound are omitted.
   */
  protected finish(run: StrategyRun): ExecutionResult {
    const { plan, tracker, origin } = run;
    const { variables } = tracker.state;

    const finalOutputs: Record<string, unknown> = {};
    const unbound: string[] = [];
    for (const symbol of plan.planOutputs) {
      if (variables.has(symbol)) {
        finalOutputs[symbol] = variables.get(symbol);
      } else {
        unbound.push(symbol);
      }
    }
    if (unbound.length > 0) {
      this.logger.warn('Declared plan outputs were never bound', { ...origin, symbols: unbound });
    }

    tracker.complete(finalOutputs);
    const executionTime = tracker.elapsedSeconds();
    this.logger.info('Execution completed', { ...origin, executionTime });
    this.events.emit(EngineEventType.EXECUTION_COMPLETED, origin, { executionTime, finalOutputs });
    return tracker.toResult();
  }
}
