import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { ConfigError, agentSuccess, retrievalSuccess, toolSuccess } from '../index.js';
import { MockAgentFacade, MockRetrievalFacade, MockToolFacade, StaticFacade } from '../testing/index.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('StaticFacade', () => {
  it('answers tools, retrieval and the agent from a fixture file', async () => {
    const facade = await StaticFacade.fromFile(fixture('facade.yaml'));

    await expect(facade.invoke('dc_power_flow')).resolves.toEqual({ success: true, value: 2750, unit: 'MW' });
    await expect(facade.invoke('ac_power_flow')).resolves.toEqual({
      success: false,
      error: 'solver did not converge',
    });
    await expect(facade.query('Thermal rating of LineA')).resolves.toEqual({
      success: true,
      answer: '2800',
      raw: { rating_mw: 2800 },
      confidence: 0.9,
      sources: ['line-ratings.pdf'],
    });
    await expect(facade.run()).resolves.toEqual({ success: true, answer: 'P_lim = 2750' });
  });

  it('fails calls the fixture does not cover', async () => {
    const facade = StaticFacade.fromFixture({});

    await expect(facade.invoke('dc_power_flow')).resolves.toEqual({
      success: false,
      error: 'Unknown tool "dc_power_flow"',
    });
    await expect(facade.query('weather')).resolves.toEqual({
      success: false,
      error: 'No fixture answer for query "weather"',
    });
    await expect(facade.run()).resolves.toEqual({ success: false, error: 'No agent answer in fixtures' });
  });

  it('rejects fixtures of the wrong shape', () => {
    expect(() => StaticFacade.fromFixture({ retrieval: [{ answer: 'x' }] })).toThrow(ConfigError);
    expect(() => StaticFacade.fromFixture({ retrieval: [{ answer: 'x' }] })).toThrow(
      'Invalid fixtures at "retrieval.0.match": Required'
    );
    expect(() => StaticFacade.fromFixture({ agents: {} })).toThrow('Invalid fixtures at "(root)"');
  });

  it('reports an unreadable fixture file', async () => {
    await expect(StaticFacade.fromFile(fixture('missing.yaml'))).rejects.toThrow('Cannot read fixture file');
  });
});

describe('mock facades', () => {
  it('records tool calls and answers per tool', async () => {
    const tools = new MockToolFacade({ dc_power_flow: toolSuccess(2750) }).respond('echo', (args) =>
      toolSuccess(args.value)
    );

    await expect(tools.invoke('dc_power_flow', { outage: 'LineB' })).resolves.toEqual({ success: true, value: 2750 });
    await expect(tools.invoke('echo', { value: 'x' })).resolves.toEqual({ success: true, value: 'x' });
    await expect(tools.invoke('missing', {})).resolves.toEqual({ success: false, error: 'Unknown tool "missing"' });
    expect(tools.callCount).toBe(3);
    expect(tools.getCalls()[0].args).toEqual({ toolName: 'dc_power_flow', args: { outage: 'LineB' } });

    tools.reset();
    expect(tools.getLastCall()).toBeUndefined();
  });

  it('matches retrieval queries by case-insensitive substring', async () => {
    const retrieval = new MockRetrievalFacade({ 'Thermal Rating': retrievalSuccess('2800') });

    await expect(retrieval.query('thermal rating of LineA')).resolves.toEqual({ success: true, answer: '2800' });
    await expect(retrieval.query('weather')).resolves.toEqual({ success: false, error: 'No documents matched' });
    expect(retrieval.getLastCall()?.args).toBe('weather');
  });

  it('answers agent tasks with text, results or a function', async () => {
    await expect(new MockAgentFacade('P_lim = 1').run('task')).resolves.toEqual({ success: true, answer: 'P_lim = 1' });
    await expect(MockAgentFacade.failing('offline').run('task')).resolves.toEqual({ success: false, error: 'offline' });

    const echo = new MockAgentFacade(async (task) => agentSuccess(task.toUpperCase()));
    await expect(echo.run('abc')).resolves.toEqual({ success: true, answer: 'ABC' });
  });
});
