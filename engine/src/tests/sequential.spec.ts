import { describe, it, expect } from 'vitest';
import {
  ExecutionStatus,
  MissingInputError,
  StepGraphCache,
  retrievalSuccess,
  toolFailure,
  toolSuccess,
  LogLevel,
  type ExecutionResult,
} from '../index.js';
import { MockRetrievalFacade, MockToolFacade } from '../testing/index.js';
import { captureLogger } from './fixtures/logger.js';
import { dcLimitPlan, planWithSteps } from './fixtures/plans.js';
import { recordEventTypes, sequentialStrategy } from './fixtures/strategies.js';

const request = { scenario: 'LineB tripped', inputs: { line: 'LineB' } };

function facades() {
  return {
    retrieval: new MockRetrievalFacade({ 'thermal rating': retrievalSuccess('2800', { raw: { rating_mw: 2800 } }) }),
    tools: new MockToolFacade({ dc_power_flow: toolSuccess(2750, 'MW') }),
  };
}

describe('SequentialStrategy', () => {
  it('runs every step in order and collects the declared outputs', async () => {
    const { retrieval, tools } = facades();
    const { strategy, events } = sequentialStrategy({ retrieval, tools });
    const seen = recordEventTypes(events);

    const result = await strategy.execute(dcLimitPlan(), request);

    expect(result.status).toBe(ExecutionStatus.COMPLETED);
    expect(result.success).toBe(true);
    expect(result.strategy).toBe('sequential');
    expect(result.finalOutputs).toEqual({ P_lim: 2750 });
    expect(result.variables).toEqual({ line: 'LineB', P_max: '2800', P_line: 2750, P_lim: 2750 });
    expect(result.stepHistory.map((record) => [record.stepId, record.success])).toEqual([
      ['lookup_rating', true],
      ['power_flow', true],
      ['limit', true],
    ]);
    expect(retrieval.getLastCall()?.args).toBe('thermal rating of LineB');
    expect(tools.getLastCall()?.args).toEqual({ toolName: 'dc_power_flow', args: { outage: 'LineB', base_mw: 3200 } });
    expect(seen).toEqual([
      'execution.started',
      'step.started',
      'step.completed',
      'step.started',
      'step.completed',
      'step.started',
      'step.completed',
      'execution.completed',
    ]);
  });

  it('throws on missing inputs before anything runs', async () => {
    const { retrieval, tools } = facades();
    const { strategy, events } = sequentialStrategy({ retrieval, tools });
    const seen = recordEventTypes(events);

    await expect(strategy.execute(dcLimitPlan(), { scenario: 's', inputs: {} })).rejects.toBeInstanceOf(
      MissingInputError
    );
    expect(seen).toEqual([]);
    expect(retrieval.callCount).toBe(0);
  });

  it('stops at the first failing step and keeps earlier bindings', async () => {
    const retrieval = facades().retrieval;
    const tools = new MockToolFacade({ dc_power_flow: toolFailure('solver diverged') });
    const { strategy, events } = sequentialStrategy({ retrieval, tools });
    const seen = recordEventTypes(events);

    const result = await strategy.execute(dcLimitPlan(), request);

    expect(result.status).toBe(ExecutionStatus.FAILED);
    expect(result.success).toBe(false);
    expect(result.failedStep).toBe('power_flow');
    expect(result.errorMessage).toBe('Tool "dc_power_flow" failed: solver diverged');
    expect(result.errorCode).toBe('GP-X-002');
    expect(result.variables).toEqual({ line: 'LineB', P_max: '2800' });
    expect(result.finalOutputs).toEqual({});
    expect(result.stepHistory).toHaveLength(2);
    expect(seen.slice(-3)).toEqual(['step.started', 'step.failed', 'execution.failed']);
  });

  it('fails the run when retrieval finds nothing', async () => {
    const { strategy } = sequentialStrategy({ retrieval: new MockRetrievalFacade(), tools: facades().tools });

    const result = await strategy.execute(dcLimitPlan(), request);

    expect(result.failedStep).toBe('lookup_rating');
    expect(result.errorMessage).toBe('Retrieval failed: No documents matched');
    expect(result.errorCode).toBe('GP-X-001');
  });

  it('fails a compute step whose input was never bound', async () => {
    const plan = planWithSteps([
      {
        id: 'cap',
        type: 'compute',
        description: 'Cap the flow',
        formula: 'min(a, 1)',
        inputs: { a: '{P_line}' },
        outputs: ['x'],
      },
    ]);
    const { strategy } = sequentialStrategy(facades());

    const result = await strategy.execute(plan, { scenario: 's', inputs: {} });

    expect(result.status).toBe(ExecutionStatus.FAILED);
    expect(result.errorMessage).toBe('Symbol "P_line" is not bound (formula: min(a, 1))');
    expect(result.errorCode).toBe('GP-F-001');
  });

  it('cancels before the first step when the signal is already aborted', async () => {
    const { retrieval, tools } = facades();
    const { strategy } = sequentialStrategy({ retrieval, tools });
    const controller = new AbortController();
    controller.abort();

    const result = await strategy.execute(dcLimitPlan(), { ...request, signal: controller.signal });

    expect(result.status).toBe(ExecutionStatus.CANCELLED);
    expect(result.errorMessage).toBe(`Execution ${result.executionId} was cancelled before step "lookup_rating"`);
    expect(result.errorCode).toBe('GP-E-001');
    expect(result.stepHistory).toEqual([]);
    expect(retrieval.callCount).toBe(0);
  });

  it('cancels between steps', async () => {
    const controller = new AbortController();
    const retrieval = facades().retrieval;
    const tools = new MockToolFacade({
      dc_power_flow: () => {
        controller.abort();
        return toolSuccess(2750);
      },
    });
    const { strategy, events } = sequentialStrategy({ retrieval, tools });
    const seen = recordEventTypes(events);

    const result = await strategy.execute(dcLimitPlan(), { ...request, signal: controller.signal });

    expect(result.status).toBe(ExecutionStatus.CANCELLED);
    expect(result.stepHistory.map((record) => record.stepId)).toEqual(['lookup_rating', 'power_flow']);
    expect(result.variables).toEqual({ line: 'LineB', P_max: '2800', P_line: 2750 });
    expect(seen[seen.length - 1]).toBe('execution.cancelled');
  });

  it('passes unresolved placeholders to tools verbatim with a warning', async () => {
    const { logger, lines } = captureLogger(LogLevel.WARN);
    const tools = new MockToolFacade({ echo: toolSuccess('ok') });
    const plan = planWithSteps([
      { id: 't', type: 'tool', description: 'Echo', tool_name: 'echo', inputs: { target: '{nowhere}' }, outputs: ['r'] },
    ]);
    const { strategy } = sequentialStrategy({ tools, retrieval: new MockRetrievalFacade(), logger });

    const result = await strategy.execute(plan, { scenario: 's', inputs: {} });

    expect(result.status).toBe(ExecutionStatus.COMPLETED);
    expect(tools.getLastCall()?.args.args).toEqual({ target: '{nowhere}' });
    expect(lines).toEqual([
      'WARN  [GridPlan] Unresolved placeholders passed to tool {"stepId":"t","input":"target","symbols":["nowhere"]}',
    ]);
  });

  it('leaves unresolved placeholders in a retrieval query and keeps going', async () => {
    const { logger, lines } = captureLogger(LogLevel.WARN);
    const retrieval = new MockRetrievalFacade({ rating: retrievalSuccess('2800') });
    const plan = planWithSteps([
      { id: 'q', type: 'rag', description: 'Lookup', query: 'rating of {missing_line}', outputs: ['r'] },
    ]);
    const { strategy } = sequentialStrategy({ tools: new MockToolFacade(), retrieval, logger });

    const result = await strategy.execute(plan, { scenario: 's', inputs: {} });

    expect(result.status).toBe(ExecutionStatus.COMPLETED);
    expect(result.variables).toEqual({ r: '2800' });
    expect(retrieval.getLastCall()?.args).toBe('rating of {missing_line}');
    expect(lines).toEqual([
      'WARN  [GridPlan] Unresolved placeholders left in query {"stepId":"q","symbols":["missing_line"]}',
    ]);
  });

  it('gives the same outputs and history on repeated runs', async () => {
    const { strategy } = sequentialStrategy(facades());
    const withoutTiming = (result: ExecutionResult) =>
      result.stepHistory.map(({ timestamp: _timestamp, durationMs: _durationMs, ...record }) => record);

    const first = await strategy.execute(dcLimitPlan(), request);
    const second = await strategy.execute(dcLimitPlan(), request);

    expect(second.executionId).not.toBe(first.executionId);
    expect(second.finalOutputs).toEqual(first.finalOutputs);
    expect(withoutTiming(second)).toEqual(withoutTiming(first));
  });

  it('binds the retrieval answer first and the raw result to later outputs', async () => {
    const plan = planWithSteps([
      { id: 'r', type: 'rag', description: 'Lookup', query: 'thermal rating', outputs: ['answer', 'details', 'more'] },
    ]);
    const { strategy } = sequentialStrategy(facades());

    const result = await strategy.execute(plan, { scenario: 's', inputs: {} });

    expect(result.variables).toEqual({
      answer: '2800',
      details: { rating_mw: 2800 },
      more: { rating_mw: 2800 },
    });
  });

  it('warns about declared outputs no step bound', async () => {
    const { logger, lines } = captureLogger(LogLevel.WARN);
    const plan = planWithSteps(
      [{ id: 'c', type: 'compute', description: 'Constant', formula: '5', outputs: ['x'] }],
      { plan_outputs: ['x', 'y'] }
    );
    const { strategy } = sequentialStrategy({ ...facades(), logger });

    const result = await strategy.execute(plan, { scenario: 's', inputs: {} });

    expect(result.finalOutputs).toEqual({ x: 5 });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^WARN {2}\[GridPlan\] Declared plan outputs were never bound .*"symbols":\["y"\]\}$/);
  });

  it('caches the step graph when given a cache', async () => {
    const graphCache = new StepGraphCache();
    const { strategy } = sequentialStrategy({ ...facades(), graphCache });

    await strategy.execute(dcLimitPlan(), request);
    await strategy.execute(dcLimitPlan(), request);

    expect(graphCache.has('dc_limit')).toBe(true);
    expect(graphCache.size).toBe(1);
  });
});
