/**
 * Step Executor
 *
 * Dispatches a step to the handler for its kind. Holds no run state;
 * one executor serves any number of concurrent runs.
 *
 * @module execution
 */

import type { RetrievalFacade, ToolFacade } from '../facades/FacadeTypes.js';
import { FormulaEvaluator } from '../formula/FormulaEvaluator.js';
import { StepKind, assertNever, type PlanStep } from '../types/plan-types.js';
import {
  ComputeStepHandler,
  RetrieveStepHandler,
  ToolStepHandler,
  type StepContext,
  type StepHandlerMap,
  type StepOutputs,
} from './handlers/index.js';

export interface StepExecutorOptions {
  tools: ToolFacade;
  retrieval: RetrievalFacade;
  evaluator?: FormulaEvaluator;
}

export class StepExecutor {
  private readonly handlers: StepHandlerMap;

  constructor(options: StepExecutorOptions) {
    this.handlers = {
      [StepKind.RETRIEVE]: new RetrieveStepHandler(options.retrieval),
      [StepKind.TOOL]: new ToolStepHandler(options.tools),
      [StepKind.COMPUTE]: new ComputeStepHandler(options.evaluator),
    };
  }

  execute(step: PlanStep, context: StepContext): Promise<StepOutputs> {
    switch (step.kind) {
      case StepKind.RETRIEVE:
        return this.handlers[StepKind.RETRIEVE].execute(step, context);
      case StepKind.TOOL:
        return this.handlers[StepKind.TOOL].execute(step, context);
      case StepKind.COMPUTE:
        return this.handlers[StepKind.COMPUTE].execute(step, context);
      default:
        return assertNever(step, 'Unknown step kind');
    }
  }
}
