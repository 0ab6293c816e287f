import { ExecutionStatus, ExitCodes, PlanEngineError, type ExecutionResult } from '@gridplan/engine';

/**
 * Exit code for an error thrown by a command
 */
export function exitCodeForError(error: unknown): ExitCodes {
  return error instanceof PlanEngineError ? error.exitCode : ExitCodes.GENERAL_ERROR;
}

/**
 * Exit code for a finished run
 */
export function exitCodeForResult(result: ExecutionResult): ExitCodes {
  switch (result.status) {
    case ExecutionStatus.COMPLETED:
      return ExitCodes.SUCCESS;
    case ExecutionStatus.CANCELLED:
      return ExitCodes.CANCELLED;
    default:
      return ExitCodes.EXECUTION_FAILED;
  }
}
