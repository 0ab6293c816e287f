/**
 * Complexity Classifier
 *
 * Labels a plan linear, branch or multi_agent from its structure and the
 * wording of its steps. Pure and deterministic: the same plan always gets
 * the same analysis.
 *
 * Rules, first match wins:
 * 1. multi_agent: more than 20 steps, or more than 5 retrieve and more than
 *    5 tool steps, or text spanning 3+ domain buckets
 * 2. branch: conditional language, a `complex` variable tier, or more than
 *    15 steps
 * 3. linear: everything else
 *
 * @module analysis
 */

import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { PlaceholderResolver } from '../context/PlaceholderResolver.js';
import { StepKind, type Plan, type Variable } from '../types/plan-types.js';
import { KeywordLexicon } from './KeywordLexicon.js';
import {
  ComplexityLevel,
  type ComplexityAnalysis,
  type VariableComplexity,
} from './ComplexityTypes.js';

export const LINEAR_MAX_STEPS = 15;
export const MULTI_AGENT_STEP_THRESHOLD = 20;
export const MULTI_AGENT_KIND_THRESHOLD = 5;
export const MULTI_AGENT_MIN_DOMAINS = 3;
export const COMPLEX_FORMULA_THRESHOLD = 2;

/**
 * Default strategy per level
 */
export const RECOMMENDED_STRATEGY: Readonly<Record<ComplexityLevel, string>> = {
  [ComplexityLevel.LINEAR]: 'sequential',
  [ComplexityLevel.BRANCH]: 'sequential',
  [ComplexityLevel.MULTI_AGENT]: 'delegated',
};

type Counters = Omit<ComplexityAnalysis, 'level' | 'reason' | 'recommendedStrategy'>;

interface Verdict {
  level: ComplexityLevel;
  reason: string;
}

export interface ComplexityClassifierOptions {
  lexicon?: KeywordLexicon;
  logger?: EngineLogger;
}

export class ComplexityClassifier {
  private readonly lexicon: KeywordLexicon;
  private readonly logger: EngineLogger;

  constructor(options: ComplexityClassifierOptions = {}) {
    this.lexicon = options.lexicon ?? KeywordLexicon.default();
    this.logger = options.logger ?? LoggerManager.getLogger();
  }

  classify(plan: Plan): ComplexityAnalysis {
    const counters = this.count(plan);
    const verdict = this.checkMultiAgent(counters) ?? this.checkBranch(counters) ?? {
      level: ComplexityLevel.LINEAR,
      reason: 'Sequential steps without conditional logic',
    };

    this.logger.debug('Classified plan complexity', {
      planId: plan.planId,
      level: verdict.level,
      reason: verdict.reason,
    });

    return {
      ...counters,
      level: verdict.level,
      reason: verdict.reason,
      recommendedStrategy: RECOMMENDED_STRATEGY[verdict.level],
    };
  }

  private count(plan: Plan): Counters {
    const stepKinds: Record<StepKind, number> = {
      [StepKind.RETRIEVE]: 0,
      [StepKind.TOOL]: 0,
      [StepKind.COMPUTE]: 0,
    };
    for (const step of plan.steps) {
      stepKinds[step.kind] += 1;
    }

    const text = [plan.title, plan.description, ...plan.steps.map((step) => step.description)].join(' ');

    return {
      planId: plan.planId,
      stepCount: plan.steps.length,
      stepKinds,
      hasDependencies: this.hasDependencies(plan),
      hasConditions: this.hasConditions(plan),
      variableComplexity: this.variableComplexity(plan.variables),
      domains: this.lexicon.domainsIn(text),
    };
  }

  private hasDependencies(plan: Plan): boolean {
    const produced = new Set<string>();
    for (const step of plan.steps) {
      if (PlaceholderResolver.symbolsInInputs(step.inputs).some((symbol) => produced.has(symbol))) {
        return true;
      }
      step.outputs.forEach((symbol) => produced.add(symbol));
    }
    return false;
  }

  private hasConditions(plan: Plan): boolean {
    return plan.steps.some(
      (step) =>
        this.lexicon.hasConditionalLanguage(step.description) ||
        (step.kind === StepKind.COMPUTE && this.lexicon.hasFormulaConditional(step.formula))
    );
  }

  private variableComplexity(variables: readonly Variable[]): VariableComplexity {
    let formulaCount = 0;
    const complexFormulas: string[] = [];

    for (const variable of variables) {
      if (!variable.formula) continue;
      formulaCount += 1;
      if (this.lexicon.aggregatesIn(variable.formula).length > 0) {
        complexFormulas.push(variable.symbol);
      }
    }

    const tier =
      complexFormulas.length > COMPLEX_FORMULA_THRESHOLD ? 'complex' : formulaCount > 0 ? 'moderate' : 'simple';
    return { tier, formulaCount, complexFormulas };
  }

  private checkMultiAgent(counters: Counters): Verdict | null {
    const { stepCount, stepKinds, domains } = counters;

    if (stepCount > MULTI_AGENT_STEP_THRESHOLD) {
      return {
        level: ComplexityLevel.MULTI_AGENT,
        reason: `${stepCount} steps exceed the multi-agent threshold of ${MULTI_AGENT_STEP_THRESHOLD}`,
      };
    }
    if (stepKinds[StepKind.RETRIEVE] > MULTI_AGENT_KIND_THRESHOLD && stepKinds[StepKind.TOOL] > MULTI_AGENT_KIND_THRESHOLD) {
      return {
        level: ComplexityLevel.MULTI_AGENT,
        reason: `${stepKinds[StepKind.RETRIEVE]} retrieval and ${stepKinds[StepKind.TOOL]} tool steps need coordinated agents`,
      };
    }
    if (domains.length >= MULTI_AGENT_MIN_DOMAINS) {
      return {
        level: ComplexityLevel.MULTI_AGENT,
        reason: `Plan spans ${domains.length} domains: ${domains.join(', ')}`,
      };
    }
    return null;
  }

  private checkBranch(counters: Counters): Verdict | null {
    if (counters.hasConditions) {
      return { level: ComplexityLevel.BRANCH, reason: 'Step wording or formulas contain conditional logic' };
    }
    if (counters.variableComplexity.tier === 'complex') {
      return {
        level: ComplexityLevel.BRANCH,
        reason: `${counters.variableComplexity.complexFormulas.length} variable formulas use aggregate functions`,
      };
    }
    if (counters.stepCount > LINEAR_MAX_STEPS) {
      return {
        level: ComplexityLevel.BRANCH,
        reason: `${counters.stepCount} steps exceed the linear threshold of ${LINEAR_MAX_STEPS}`,
      };
    }
    return null;
  }
}
