/**
 * Execution Strategy Router
 *
 * Decides which registered strategy runs a plan:
 * 1. An explicit name always wins; an unregistered one is an error, never
 *    a silent fallback
 * 2. Otherwise the classifier's recommendation for the plan's level
 *    (linear/branch → sequential, multi_agent → delegated)
 *
 * @module execution
 */

import type { ComplexityAnalysis } from '../analysis/ComplexityTypes.js';
import { UnknownStrategyError } from '../errors/ValidationErrors.js';
import type { ExecutionStrategy } from './strategies/ExecutionStrategy.js';
import type { StrategyRegistry } from './strategies/StrategyRegistry.js';

export interface StrategyResolution {
  strategy: ExecutionStrategy;
  reason: string;
}

export class ExecutionStrategyRouter {
  constructor(private readonly registry: StrategyRegistry) {}

  /**
   * @throws UnknownStrategyError when the chosen name is not registered
   */
  resolve(analysis: ComplexityAnalysis, explicit?: string): StrategyResolution {
    const name = explicit ?? analysis.recommendedStrategy;
    const strategy = this.registry.get(name);
    if (!strategy) {
      throw new UnknownStrategyError(name, this.registry.list());
    }

    return {
      strategy,
      reason: explicit !== undefined
        ? `Strategy "${name}" requested explicitly`
        : `Strategy "${name}" recommended for ${analysis.level} plans`,
    };
  }
}
