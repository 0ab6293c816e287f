import { describe, it, expect } from 'vitest';
import {
  ComplexityClassifier,
  ComplexityLevel,
  ConfigError,
  KeywordLexicon,
  StepKind,
} from '../index.js';
import { dcLimitPlan, planWithSteps } from './fixtures/plans.js';

function computeSteps(count: number, description = 'Step'): unknown[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `s${i}`,
    type: 'compute',
    description: `${description} ${i}`,
    formula: '1',
    outputs: [`x${i}`],
  }));
}

function steps(kind: 'rag' | 'tool', count: number): unknown[] {
  return Array.from({ length: count }, (_, i) =>
    kind === 'rag'
      ? { id: `r${i}`, type: 'rag', description: `Lookup ${i}`, query: 'rating', outputs: [] }
      : { id: `t${i}`, type: 'tool', description: `Invoke ${i}`, tool_name: 'calc', outputs: [] }
  );
}

describe('ComplexityClassifier', () => {
  const classifier = new ComplexityClassifier();

  it('classifies a short unconditional plan as linear', () => {
    expect(classifier.classify(dcLimitPlan())).toEqual({
      planId: 'dc_limit',
      level: ComplexityLevel.LINEAR,
      reason: 'Sequential steps without conditional logic',
      stepCount: 3,
      stepKinds: { [StepKind.RETRIEVE]: 1, [StepKind.TOOL]: 1, [StepKind.COMPUTE]: 1 },
      hasDependencies: true,
      hasConditions: false,
      variableComplexity: { tier: 'moderate', formulaCount: 1, complexFormulas: ['P_lim'] },
      domains: ['electrical'],
      recommendedStrategy: 'sequential',
    });
  });

  it('treats conditional wording as a branch', () => {
    const plan = planWithSteps([
      {
        id: 'pick',
        type: 'compute',
        description: 'Select the lower limit',
        formula: 'min(a, b)',
        inputs: { a: 1, b: 2 },
        outputs: ['x'],
      },
    ]);
    const analysis = classifier.classify(plan);

    expect(analysis.level).toBe(ComplexityLevel.BRANCH);
    expect(analysis.reason).toBe('Step wording or formulas contain conditional logic');
    expect(analysis.hasDependencies).toBe(false);
  });

  it('recognizes conditional phrases in Chinese descriptions', () => {
    const plan = planWithSteps([
      { id: 'check', type: 'rag', description: '如果电压越限则切换', query: 'limits', outputs: [] },
    ]);
    const analysis = classifier.classify(plan);

    expect(analysis.hasConditions).toBe(true);
    expect(analysis.domains).toEqual(['electrical']);
  });

  it('treats conditional formula keywords as a branch', () => {
    const plan = planWithSteps([{ id: 'c', type: 'compute', description: 'Pick', formula: 'when', outputs: [] }]);
    expect(classifier.classify(plan).hasConditions).toBe(true);
  });

  it('treats many aggregate variable formulas as a branch', () => {
    const variables = ['a', 'b', 'c'].map((symbol) => ({
      name: symbol,
      symbol,
      unit: 'MW',
      formula: `sum(${symbol}1, ${symbol}2)`,
    }));
    const analysis = classifier.classify(planWithSteps(computeSteps(1), { variables }));

    expect(analysis.variableComplexity).toEqual({ tier: 'complex', formulaCount: 3, complexFormulas: ['a', 'b', 'c'] });
    expect(analysis.level).toBe(ComplexityLevel.BRANCH);
    expect(analysis.reason).toBe('3 variable formulas use aggregate functions');
  });

  it('counts aggregate names inside variable symbols', () => {
    const variables = [
      { name: 'Send limit', symbol: 'P_send', unit: 'MW', formula: 'P_max_send * 0.9' },
      { name: 'Receive limit', symbol: 'P_recv', unit: 'MW', formula: 'P_max_recv * 0.9' },
      { name: 'Line floor', symbol: 'P_floor', unit: 'MW', formula: 'P_min_line + 10' },
    ];
    const analysis = classifier.classify(planWithSteps(computeSteps(1), { variables }));

    expect(analysis.variableComplexity).toEqual({
      tier: 'complex',
      formulaCount: 3,
      complexFormulas: ['P_send', 'P_recv', 'P_floor'],
    });
    expect(analysis.level).toBe(ComplexityLevel.BRANCH);
  });

  it('gives the same analysis for the same plan every time', () => {
    const plan = dcLimitPlan();

    expect(classifier.classify(plan)).toEqual(classifier.classify(plan));
    expect(classifier.classify(plan)).toEqual(new ComplexityClassifier().classify(dcLimitPlan()));
  });

  it('treats long plans as a branch', () => {
    const analysis = classifier.classify(planWithSteps(computeSteps(16)));

    expect(analysis.level).toBe(ComplexityLevel.BRANCH);
    expect(analysis.reason).toBe('16 steps exceed the linear threshold of 15');
    expect(analysis.recommendedStrategy).toBe('sequential');
  });

  it('sends very long plans to agents', () => {
    const analysis = classifier.classify(planWithSteps(computeSteps(21)));

    expect(analysis.level).toBe(ComplexityLevel.MULTI_AGENT);
    expect(analysis.reason).toBe('21 steps exceed the multi-agent threshold of 20');
    expect(analysis.recommendedStrategy).toBe('delegated');
  });

  it('sends plans heavy in both retrieval and tool steps to agents', () => {
    const analysis = classifier.classify(planWithSteps([...steps('rag', 6), ...steps('tool', 6)]));

    expect(analysis.level).toBe(ComplexityLevel.MULTI_AGENT);
    expect(analysis.reason).toBe('6 retrieval and 6 tool steps need coordinated agents');
  });

  it('sends plans spanning three domains to agents', () => {
    const plan = planWithSteps(computeSteps(1), { title: 'Voltage, torque and cooling review' });
    const analysis = classifier.classify(plan);

    expect(analysis.level).toBe(ComplexityLevel.MULTI_AGENT);
    expect(analysis.reason).toBe('Plan spans 3 domains: electrical, mechanical, thermal');
  });

  it('checks multi-agent signals before branch signals', () => {
    const plan = planWithSteps(computeSteps(21, 'If needed, step'));
    expect(classifier.classify(plan).level).toBe(ComplexityLevel.MULTI_AGENT);
  });

  it('uses the lexicon it is given', () => {
    const lexicon = new KeywordLexicon({
      conditional: { words: ['unless'], phrases: [] },
      formulaConditional: [],
      aggregateFunctions: [],
      domains: { distribution: { words: ['feeder'], phrases: [] } },
    });
    const plan = planWithSteps(computeSteps(1, 'Trip the feeder unless loaded'));
    const analysis = new ComplexityClassifier({ lexicon }).classify(plan);

    expect(analysis.hasConditions).toBe(true);
    expect(analysis.domains).toEqual(['distribution']);
  });
});

describe('KeywordLexicon', () => {
  const lexicon = KeywordLexicon.default();

  it('matches whole English words with plural endings', () => {
    expect(lexicon.hasConditionalLanguage('Check the conditions first')).toBe(true);
    expect(lexicon.hasConditionalLanguage('Ifrit and Thenardier')).toBe(false);
  });

  it('lists aggregate functions contained in a formula', () => {
    expect(lexicon.aggregatesIn('sqrt(pow(a, 2))')).toEqual(['sqrt', 'pow']);
    expect(lexicon.aggregatesIn('P_max_send * 0.9')).toEqual(['max']);
    expect(lexicon.aggregatesIn('a + b')).toEqual([]);
  });

  it('lists domains in declaration order', () => {
    expect(lexicon.domainsIn('network data about torque and voltage')).toEqual([
      'electrical',
      'mechanical',
      'communications',
    ]);
    expect(lexicon.domainsIn('冷却系统')).toEqual(['thermal']);
  });

  it('rejects a malformed keyword file', () => {
    const url = new URL('./fixtures/bad-keywords.json', import.meta.url);

    expect(() => KeywordLexicon.load(url)).toThrow(ConfigError);
    expect(() => KeywordLexicon.load(url)).toThrow('conditional.phrases Required');
  });
});
