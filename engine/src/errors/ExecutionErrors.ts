/**
 * Execution lifecycle errors
 *
 * @module errors
 */

import { PlanEngineError } from './PlanEngineError.js';
import { PlanErrorCode } from './ErrorCodes.js';

/**
 * The abort signal fired. The run ends in `cancelled`, not `failed`.
 */
export class CancelledError extends PlanEngineError {
  constructor(
    public readonly executionId: string,
    public readonly beforeStep?: string
  ) {
    super({
      code: PlanErrorCode.EXECUTION_CANCELLED,
      message: beforeStep === undefined
        ? `Execution ${executionId} was cancelled`
        : `Execution ${executionId} was cancelled before step "${beforeStep}"`,
      context: { executionId, beforeStep },
    });
  }
}

/**
 * A cached step graph exists for this plan id but was built from a
 * different plan body
 */
export class StaleStepGraphError extends PlanEngineError {
  constructor(
    public readonly planId: string,
    cachedFingerprint: string,
    presentedFingerprint: string
  ) {
    super({
      code: PlanErrorCode.EXECUTION_STALE_GRAPH,
      message: `Step graph cached for plan "${planId}" does not match the plan presented`,
      hint: `Call invalidate("${planId}") after changing the plan`,
      context: { planId, cachedFingerprint, presentedFingerprint },
    });
  }
}
