import { CancelledError } from '../../errors/ExecutionErrors.js';
import { AgentExecutionError } from '../../errors/FacadeErrors.js';
import { errorMessage } from '../../errors/PlanEngineError.js';
import type { AgentFacade, AgentResult } from '../../facades/FacadeTypes.js';
import type { RecordTarget } from '../../state/ExecutionState.js';
import type { ExecutionRequest, ExecutionResult } from '../../types/execution-types.js';
import { StepKind, assertNever, type Plan, type PlanStep } from '../../types/plan-types.js';
import { formatValue } from '../../context/PlaceholderResolver.js';
import { BaseExecutionStrategy, elapsedMs, type StrategyDependencies } from './ExecutionStrategy.js';

export const AGENT_STEP_ID = 'agent_execution';

export interface DelegatedStrategyOptions extends StrategyDependencies {
  agent: AgentFacade;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function describeStep(step: PlanStep): string {
  switch (step.kind) {
    case StepKind.RETRIEVE:
      return `query: ${step.query}`;
    case StepKind.TOOL:
      return `tool: ${step.toolName}`;
    case StepKind.COMPUTE:
      return `formula: ${step.formula}`;
    default:
      return assertNever(step, 'Unknown step kind');
  }
}

/**
 * Task text handed to the agent
 */
export function buildAgentTask(plan: Plan, request: ExecutionRequest): string {
  const lines = [`Plan: ${plan.title}`, `Scenario: ${request.scenario}`];

  const inputs = Object.entries(request.inputs);
  if (inputs.length > 0) {
    lines.push('', 'Inputs:');
    for (const [name, value] of inputs) {
      lines.push(`- ${name} = ${formatValue(value)}`);
    }
  }

  lines.push('', 'Steps:');
  plan.steps.forEach((step, index) => {
    lines.push(`${index + 1}. ${step.description} (${describeStep(step)})`);
  });

  if (plan.planOutputs.length > 0) {
    lines.push('', `Report each output as "symbol = number": ${plan.planOutputs.join(', ')}`);
  }
  return lines.join('\n');
}

/**
 * Pull `symbol = number` or `symbol: number` pairs for the given symbols
 * out of free text. Symbols with no such pair are left out.
 */
export function parseAgentOutputs(answer: string, symbols: readonly string[]): Record<string, number> {
  const outputs: Record<string, number> = {};
  for (const symbol of symbols) {
    const pattern = new RegExp(
      `(?<![A-Za-z0-9_])${escapeRegExp(symbol)}\\s*[=:]\\s*(-?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?)`
    );
    const match = pattern.exec(answer);
    if (match) {
      outputs[symbol] = Number(match[1]);
    }
  }
  return outputs;
}

/**
 * Hands the whole plan to an agent in one call and reads the declared
 * outputs back from its answer. Writes a single history record of kind
 * `agent`.
 */
export class DelegatedStrategy extends BaseExecutionStrategy {
  readonly name = 'delegated';

  private readonly agent: AgentFacade;

  constructor(options: DelegatedStrategyOptions) {
    super(options);
    this.agent = options.agent;
  }

  async execute(plan: Plan, request: ExecutionRequest): Promise<ExecutionResult> {
    this.validateInputs(plan, request.inputs);
    const run = this.begin(plan, request);

    if (request.signal?.aborted) {
      return this.cancel(run, new CancelledError(run.tracker.executionId, AGENT_STEP_ID), AGENT_STEP_ID);
    }

    const target: RecordTarget = {
      stepId: AGENT_STEP_ID,
      kind: 'agent',
      description: `Delegate plan "${plan.planId}" to an agent`,
    };
    this.stepStarted(run, target, 0);
    const started = performance.now();

    let result: AgentResult;
    try {
      result = await this.agent.run(buildAgentTask(plan, request));
    } catch (error) {
      return this.fail(run, target, new AgentExecutionError(errorMessage(error), error), elapsedMs(started));
    }
    if (!result.success) {
      return this.fail(run, target, new AgentExecutionError(result.error), elapsedMs(started));
    }

    this.logger.debug('Agent answered', { ...run.origin, answer: result.answer });
    const outputs = parseAgentOutputs(result.answer, plan.planOutputs);
    this.stepSucceeded(run, target, outputs, elapsedMs(started));
    return this.finish(run);
  }
}
