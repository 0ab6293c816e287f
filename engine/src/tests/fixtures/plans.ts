import { PlanParser } from '../../parser/PlanParser.js';
import type { Plan } from '../../types/plan-types.js';

/**
 * Three-step plan: look up a rating, run a power flow, take the smaller value
 */
export function dcLimitDocument(): Record<string, unknown> {
  return {
    plan_id: 'dc_limit',
    title: 'DC transfer limit after line trip',
    description: 'Estimate the DC transfer limit once a parallel line has tripped',
    version: '1.0',
    variables: [
      { name: 'Line flow', symbol: 'P_line', unit: 'MW' },
      { name: 'Thermal rating', symbol: 'P_max', unit: 'MW' },
      { name: 'Transfer limit', symbol: 'P_lim', unit: 'MW', formula: 'min(P_line, P_max)' },
    ],
    steps: [
      {
        id: 'lookup_rating',
        type: 'rag',
        description: 'Look up the thermal rating of the line',
        query: 'thermal rating of {line}',
        outputs: ['P_max'],
      },
      {
        id: 'power_flow',
        type: 'tool',
        description: 'Run a DC power flow with the line out of service',
        tool_name: 'dc_power_flow',
        inputs: { outage: '{line}', base_mw: 3200 },
        outputs: ['P_line'],
      },
      {
        id: 'limit',
        type: 'compute',
        description: 'Take the smaller of flow and rating',
        formula: 'min(flow, rating)',
        inputs: { flow: '{P_line}', rating: '{P_max}' },
        outputs: ['P_lim'],
      },
    ],
    plan_inputs: { line: 'Name of the tripped line' },
    plan_outputs: ['P_lim'],
    tags: ['dc', 'transfer'],
  };
}

export function dcLimitPlan(): Plan {
  return PlanParser.parse(dcLimitDocument());
}

/**
 * Minimal valid plan with the given steps
 */
export function planWithSteps(steps: unknown[], extra: Record<string, unknown> = {}): Plan {
  return PlanParser.parse({
    plan_id: 'custom',
    title: 'Custom plan',
    description: '',
    steps,
    ...extra,
  });
}
