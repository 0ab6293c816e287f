/**
 * External facade errors
 *
 * A facade either reports a failure result or throws; the engine
 * converts both into one of these at the step boundary.
 *
 * @module errors
 */

import { PlanEngineError } from './PlanEngineError.js';
import { PlanErrorCode } from './ErrorCodes.js';

export class RetrievalError extends PlanEngineError {
  constructor(
    public readonly query: string,
    reason: string,
    cause?: unknown
  ) {
    super({
      code: PlanErrorCode.EXTERNAL_RETRIEVAL_FAILED,
      message: `Retrieval failed: ${reason}`,
      context: { query },
      cause,
    });
  }
}

export class ToolInvocationError extends PlanEngineError {
  constructor(
    public readonly toolName: string,
    reason: string,
    cause?: unknown
  ) {
    super({
      code: PlanErrorCode.EXTERNAL_TOOL_FAILED,
      message: `Tool "${toolName}" failed: ${reason}`,
      context: { toolName },
      cause,
    });
  }
}

export class AgentExecutionError extends PlanEngineError {
  constructor(reason: string, cause?: unknown) {
    super({
      code: PlanErrorCode.EXTERNAL_AGENT_FAILED,
      message: `Agent execution failed: ${reason}`,
      cause,
    });
  }
}

export class DuplicateToolError extends PlanEngineError {
  constructor(public readonly toolName: string) {
    super({
      code: PlanErrorCode.VALIDATION_DUPLICATE_TOOL,
      message: `Tool "${toolName}" is already registered`,
      context: { toolName },
    });
  }
}
