import type { StepKind } from '../types/plan-types.js';

/**
 * Structural complexity of a plan
 */
export enum ComplexityLevel {
  LINEAR = 'linear',
  BRANCH = 'branch',
  MULTI_AGENT = 'multi_agent',
}

export type VariableComplexityTier = 'simple' | 'moderate' | 'complex';

export interface VariableComplexity {
  tier: VariableComplexityTier;
  /** Declared variables carrying a formula */
  formulaCount: number;
  /** Symbols of variables whose formula names an aggregate function */
  complexFormulas: string[];
}

/**
 * Classifier output. Computed fresh per call, never cached on the plan.
 */
export interface ComplexityAnalysis {
  planId: string;
  level: ComplexityLevel;
  reason: string;
  stepCount: number;
  stepKinds: Record<StepKind, number>;
  /** Some step input reads a symbol an earlier step outputs (diagnostic only) */
  hasDependencies: boolean;
  hasConditions: boolean;
  variableComplexity: VariableComplexity;
  /** Domain buckets hit by the plan text */
  domains: string[];
  /** Strategy the router picks when none is named explicitly */
  recommendedStrategy: string;
}
