import { CancelledError } from '../../errors/ExecutionErrors.js';
import type { RetrievalFacade, ToolFacade } from '../../facades/FacadeTypes.js';
import type { FormulaEvaluator } from '../../formula/FormulaEvaluator.js';
import type { RecordTarget } from '../../state/ExecutionState.js';
import type { ExecutionRequest, ExecutionResult } from '../../types/execution-types.js';
import type { Plan, PlanStep } from '../../types/plan-types.js';
import { StepExecutor } from '../StepExecutor.js';
import { buildStepGraph, type StepGraph } from '../StepGraph.js';
import type { StepGraphCache } from '../StepGraphCache.js';
import { BaseExecutionStrategy, elapsedMs, type StrategyDependencies } from './ExecutionStrategy.js';

export interface SequentialStrategyOptions extends StrategyDependencies {
  tools: ToolFacade;
  retrieval: RetrievalFacade;
  evaluator?: FormulaEvaluator;
  /** Reuse compiled step graphs across runs */
  graphCache?: StepGraphCache;
}

function targetOf(step: PlanStep): RecordTarget {
  return { stepId: step.id, kind: step.kind, description: step.description };
}

/**
 * Runs the plan's steps one after another in declaration order.
 * The first failing step ends the run; bindings made before it stay
 * visible in the result. The abort signal is checked before every step.
 */
export class SequentialStrategy extends BaseExecutionStrategy {
  readonly name = 'sequential';

  private readonly executor: StepExecutor;
  private readonly graphCache?: StepGraphCache;

  constructor(options: SequentialStrategyOptions) {
    super(options);
    this.executor = new StepExecutor(options);
    this.graphCache = options.graphCache;
  }

  async execute(plan: Plan, request: ExecutionRequest): Promise<ExecutionResult> {
    this.validateInputs(plan, request.inputs);
    const graph = this.graphFor(plan);
    const run = this.begin(plan, request);
    const context = {
      executionId: run.tracker.executionId,
      variables: run.tracker.state.variables,
      logger: this.logger,
    };

    for (const node of graph.nodes) {
      const { step } = node;
      if (request.signal?.aborted) {
        return this.cancel(run, new CancelledError(run.tracker.executionId, step.id), step.id);
      }

      const target = targetOf(step);
      this.stepStarted(run, target, node.index);
      const started = performance.now();
      try {
        const outputs = await this.executor.execute(step, context);
        this.stepSucceeded(run, target, outputs, elapsedMs(started));
      } catch (error) {
        return this.fail(run, target, error, elapsedMs(started));
      }
    }

    return this.finish(run);
  }

  private graphFor(plan: Plan): StepGraph {
    return this.graphCache ? this.graphCache.get(plan) : buildStepGraph(plan);
  }
}
