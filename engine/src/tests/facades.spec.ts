import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  DuplicateToolError,
  TimeoutManager,
  ToolRegistry,
  defineTool,
  retrievalSuccess,
  toolSuccess,
  withRetrievalTimeout,
  withToolTimeout,
} from '../index.js';

const powerFlow = defineTool({
  name: 'dc_power_flow',
  description: 'DC power flow with one line out of service',
  inputSchema: z.object({ outage: z.string(), base_mw: z.number() }),
  run: ({ base_mw }) => toolSuccess(base_mw - 400, 'MW'),
});

describe('ToolRegistry', () => {
  it('runs a registered tool with validated arguments', async () => {
    const registry = new ToolRegistry().register(powerFlow);

    await expect(registry.invoke('dc_power_flow', { outage: 'LineB', base_mw: 3200 })).resolves.toEqual({
      success: true,
      value: 2800,
      unit: 'MW',
    });
  });

  it('turns invalid arguments into a failure result', async () => {
    const registry = new ToolRegistry().register(powerFlow);

    await expect(registry.invoke('dc_power_flow', { outage: 'LineB' })).resolves.toEqual({
      success: false,
      error: 'Invalid arguments for tool "dc_power_flow": base_mw: Required',
    });
  });

  it('reports unknown tools with the registered names', async () => {
    await expect(new ToolRegistry().register(powerFlow).invoke('ac_flow', {})).resolves.toEqual({
      success: false,
      error: 'Unknown tool "ac_flow". Available tools: dc_power_flow',
    });
    await expect(new ToolRegistry().invoke('ac_flow', {})).resolves.toEqual({
      success: false,
      error: 'Unknown tool "ac_flow". No tools are registered',
    });
  });

  it('turns a throwing tool into a failure result', async () => {
    const registry = new ToolRegistry().register(
      defineTool({
        name: 'solver',
        description: 'Always diverges',
        inputSchema: z.object({}),
        run: () => {
          throw new Error('solver diverged');
        },
      })
    );

    await expect(registry.invoke('solver', {})).resolves.toEqual({
      success: false,
      error: 'Tool "solver" threw: solver diverged',
    });
  });

  it('refuses a second tool with the same name', () => {
    const registry = new ToolRegistry().register(powerFlow);

    expect(() => registry.register(powerFlow)).toThrow(DuplicateToolError);
    expect(registry.unregister('dc_power_flow')).toBe(true);
    expect(registry.has('dc_power_flow')).toBe(false);
  });

  it('describes registered tools', () => {
    const registry = new ToolRegistry().registerAll([powerFlow]);

    expect(registry.list()).toEqual(['dc_power_flow']);
    expect(registry.describe()).toEqual([
      { name: 'dc_power_flow', description: 'DC power flow with one line out of service' },
    ]);
  });
});

describe('timeout facades', () => {
  const never = <T>(): Promise<T> => new Promise<T>(() => {});

  it('turns a slow tool call into a failure result', async () => {
    const tools = withToolTimeout({ invoke: () => never() }, 20);

    await expect(tools.invoke('dc_power_flow', {})).resolves.toEqual({
      success: false,
      error: 'Tool "dc_power_flow" timed out after 20 ms',
    });
  });

  it('turns a slow retrieval into a failure result', async () => {
    const retrieval = withRetrievalTimeout({ query: () => never() }, 20);

    await expect(retrieval.query('rating')).resolves.toEqual({
      success: false,
      error: 'Retrieval query timed out after 20 ms',
    });
  });

  it('passes fast results and other errors through', async () => {
    const fast = withRetrievalTimeout({ query: async () => retrievalSuccess('2800 MW') }, 1000);
    const broken = withToolTimeout(
      {
        invoke: async () => {
          throw new Error('connection refused');
        },
      },
      1000
    );

    await expect(fast.query('rating')).resolves.toEqual({ success: true, answer: '2800 MW' });
    await expect(broken.invoke('dc_power_flow', {})).rejects.toThrow('connection refused');
  });
});

describe('TimeoutManager.parseTimeout', () => {
  it('reads milliseconds, seconds and minutes', () => {
    expect(TimeoutManager.parseTimeout(250)).toBe(250);
    expect(TimeoutManager.parseTimeout('250')).toBe(250);
    expect(TimeoutManager.parseTimeout('1.5s')).toBe(1500);
    expect(TimeoutManager.parseTimeout('2m')).toBe(120_000);
    expect(() => TimeoutManager.parseTimeout('soon')).toThrow('Invalid timeout format: "soon"');
  });
});
