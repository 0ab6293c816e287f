/**
 * Request validation errors
 *
 * Raised before any step runs: the caller asked for something the
 * engine cannot honour as given.
 *
 * @module errors
 */

import { PlanEngineError } from './PlanEngineError.js';
import { PlanErrorCode } from './ErrorCodes.js';

/**
 * One or more declared plan inputs were not supplied.
 * Lists every missing key, not just the first.
 */
export class MissingInputError extends PlanEngineError {
  constructor(
    public readonly planId: string,
    public readonly missing: readonly string[]
  ) {
    super({
      code: PlanErrorCode.VALIDATION_MISSING_INPUT,
      message: `Plan "${planId}" is missing required input(s): ${missing.join(', ')}`,
      path: 'plan.plan_inputs',
      hint: `Provide ${missing.map((key) => `"${key}"`).join(', ')}`,
      context: { planId, missing: [...missing] },
    });
  }
}

export class UnknownStrategyError extends PlanEngineError {
  constructor(
    public readonly strategy: string,
    public readonly available: readonly string[]
  ) {
    super({
      code: PlanErrorCode.VALIDATION_UNKNOWN_STRATEGY,
      message: `Unknown execution strategy "${strategy}"`,
      hint: available.length > 0
        ? `Registered strategies: ${available.join(', ')}`
        : 'No execution strategies are registered',
      context: { strategy, available: [...available] },
    });
  }
}

/**
 * No plan in the catalog matches the scenario (and no fallback is set),
 * or a plan id lookup failed
 */
export class PlanNotFoundError extends PlanEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: PlanErrorCode.VALIDATION_PLAN_NOT_FOUND, message, context });
  }

  static forScenario(scenario: string, registered: number): PlanNotFoundError {
    return new PlanNotFoundError(`No plan matches scenario "${scenario}"`, { scenario, registered });
  }

  static forId(planId: string): PlanNotFoundError {
    return new PlanNotFoundError(`Plan "${planId}" is not registered`, { planId });
  }
}

/**
 * Invalid engine configuration
 */
export class ConfigError extends PlanEngineError {
  constructor(message: string, path?: string, context?: Record<string, unknown>) {
    super({ code: PlanErrorCode.RUNTIME_INVALID_CONFIG, message, path, context });
  }
}
