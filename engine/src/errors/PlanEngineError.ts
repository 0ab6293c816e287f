/**
 * Base Plan Engine Error Class
 *
 * Foundation for all engine errors with diagnostic capabilities.
 * Provides structured error information for the CLI, logs and
 * ExecutionResult records.
 *
 * ARCHITECTURE:
 * - Error codes (GP-XX-NNN): structured codes for error identification
 * - Exit codes (ExitCodes): process exit codes for shell scripts
 * - Severity levels: ERROR, WARNING
 * - Context + hints: help users debug and fix issues
 *
 * @module errors
 */

import { ExitCodes } from './ExitCodes.js';
import {
  PlanErrorCode,
  ErrorSeverity,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
  isUserError,
  isRetryable,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 * Contains all data needed to understand and debug an error
 */
export interface PlanEngineErrorDiagnostic {
  /** Structured error code (e.g., GP-S-001) */
  code: PlanErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code; derived from the error code when omitted */
  exitCode?: ExitCodes;

  /** Path to the error location (e.g., "plan.steps[2].tool_name") */
  path?: string;

  /** Suggestion for fixing the error; derived from the error code when omitted */
  hint?: string;

  severity?: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;

  /** Underlying error, when this one wraps another */
  cause?: unknown;
}

/**
 * JSON shape of a serialized engine error
 */
export interface PlanEngineErrorJSON {
  name: string;
  category: string;
  code: PlanErrorCode;
  exitCode: ExitCodes;
  message: string;
  description: string;
  path?: string;
  hint?: string;
  severity: ErrorSeverity;
  context?: Record<string, unknown>;
  timestamp: string;
  isUserError: boolean;
  isRetryable: boolean;
}

/**
 * Base error class for all plan engine errors
 *
 * @example
 * ```typescript
 * throw new PlanEngineError({
 *   code: PlanErrorCode.SCHEMA_MISSING_FIELD,
 *   message: 'Missing required field "plan_id"',
 *   path: 'plan',
 *   hint: 'Add "plan_id: my_plan" to your plan definition',
 * });
 * ```
 */
export class PlanEngineError extends Error {
  /** Error diagnostic information */
  public readonly diagnostic: Readonly<PlanEngineErrorDiagnostic>;

  /** Timestamp when error occurred */
  public readonly timestamp: Date;

  private readonly resolvedExitCode: ExitCodes;
  private readonly resolvedSeverity: ErrorSeverity;

  constructor(diagnostic: PlanEngineErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause === undefined ? undefined : { cause: diagnostic.cause });
    this.name = new.target.name;
    this.resolvedExitCode = diagnostic.exitCode ?? getExitCodeForError(diagnostic.code);
    this.resolvedSeverity = diagnostic.severity ?? ErrorSeverity.ERROR;
    this.diagnostic = {
      ...diagnostic,
      exitCode: this.resolvedExitCode,
      severity: this.resolvedSeverity,
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): PlanErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCodes {
    return this.resolvedExitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.resolvedSeverity;
  }

  get context(): Record<string, unknown> | undefined {
    return this.diagnostic.context;
  }

  /**
   * Get detailed error description
   */
  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if the user can fix this by changing the plan, inputs or command line
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  /**
   * True if a retry might succeed
   */
  get isRetryable(): boolean {
    return isRetryable(this.code);
  }

  /**
   * Error category (Schema, Validation, Formula, Execution, External, Runtime)
   */
  get category(): string {
    return getErrorCategory(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  override toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `\n\n${this.message}`;

    if (this.hint) {
      msg += `\n\nHint: ${this.hint}`;
    }

    if (this.context && Object.keys(this.context).length > 0) {
      msg += `\n\nContext: ${JSON.stringify(this.context, null, 2)}`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): PlanEngineErrorJSON {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      description: this.description,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      isUserError: this.isUserError,
      isRetryable: this.isRetryable,
    };
  }
}

/**
 * Raised when the engine reaches a state its own invariants forbid
 * (an illegal state transition, for instance)
 */
export class InternalEngineError extends PlanEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: PlanErrorCode.RUNTIME_INTERNAL_ERROR, message, context });
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
