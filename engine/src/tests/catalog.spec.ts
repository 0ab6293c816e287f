import { describe, it, expect } from 'vitest';
import { PlanCatalog, PlanNotFoundError, planTerms, type Plan } from '../index.js';
import { dcLimitPlan, planWithSteps } from './fixtures/plans.js';

function voltagePlan(): Plan {
  return planWithSteps([{ id: 'c', type: 'compute', description: 'Constant', formula: '1', outputs: ['v'] }], {
    plan_id: 'voltage',
    title: 'Voltage recovery',
    tags: ['voltage'],
  });
}

describe('planTerms', () => {
  it('combines tags and title words, lower-cased and without duplicates', () => {
    expect(planTerms(dcLimitPlan())).toEqual(['dc', 'transfer', 'limit', 'after', 'line', 'trip']);
  });
});

describe('PlanCatalog', () => {
  it('picks the plan with the most terms found in the scenario', () => {
    const catalog = new PlanCatalog([voltagePlan(), dcLimitPlan()]);

    const match = catalog.select('LineB tripped, check DC transfer');

    expect(match?.plan.planId).toBe('dc_limit');
    expect(match?.score).toBe(4);
    expect(match?.matched).toEqual(['dc', 'transfer', 'line', 'trip']);
    expect(match?.fallback).toBe(false);
    expect(catalog.select('Voltage sag at the border')?.plan.planId).toBe('voltage');
  });

  it('keeps registration order on ties', () => {
    const catalog = new PlanCatalog([dcLimitPlan(), voltagePlan()]);

    expect(catalog.select('dc voltage')?.plan.planId).toBe('dc_limit');
  });

  it('returns nothing when no plan matches and no fallback is set', () => {
    const catalog = new PlanCatalog([dcLimitPlan(), voltagePlan()]);

    expect(catalog.select('weather report')).toBeUndefined();
  });

  it('uses the fallback plan when nothing matches', () => {
    const catalog = new PlanCatalog([dcLimitPlan(), voltagePlan()]);
    catalog.setFallback('voltage');

    expect(catalog.select('weather report')).toEqual({
      plan: catalog.get('voltage'),
      score: 0,
      matched: [],
      fallback: true,
    });
  });

  it('only accepts registered plans as fallback', () => {
    const catalog = new PlanCatalog([dcLimitPlan()]);

    expect(() => catalog.setFallback('missing')).toThrow(PlanNotFoundError);
    expect(() => catalog.setFallback('missing')).toThrow('Plan "missing" is not registered');
  });

  it('clears the fallback when that plan is removed', () => {
    const catalog = new PlanCatalog([dcLimitPlan(), voltagePlan()]);
    catalog.setFallback('voltage');

    expect(catalog.remove('voltage')).toBe(true);
    expect(catalog.fallback).toBeUndefined();
    expect(catalog.size).toBe(1);
  });

  it('replaces a plan registered under the same id', () => {
    const catalog = new PlanCatalog([voltagePlan()]);
    const replacement = planWithSteps([{ id: 'c', type: 'compute', description: 'Two', formula: '2', outputs: ['v'] }], {
      plan_id: 'voltage',
      title: 'Voltage support',
    });

    catalog.register(replacement);

    expect(catalog.list()).toEqual([replacement]);
  });
});
