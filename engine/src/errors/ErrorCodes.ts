/**
 * Plan Engine Error Codes
 *
 * Structured diagnostic codes for the plan execution engine.
 * These are separate from process exit codes (see ExitCodes.ts).
 *
 * TWO-LAYER SYSTEM:
 * ================
 * 1. Exit Codes: process termination codes for the CLI and shell scripts
 *    - Example: ExitCodes.INVALID_SCHEMA (103) for schema validation failures
 *
 * 2. Error Codes (this file): precise identification of what went wrong
 *    - Used by the engine, logged, and copied into ExecutionResult.errorCode
 *    - Example: GP-S-006 (unknown field) → ExitCodes.INVALID_SCHEMA
 *
 * Format: GP-[Category]-[Number]
 *
 * Categories:
 * - S: Schema/Structure errors (YAML syntax, field validation)
 * - V: Validation errors (missing inputs, unknown strategy, no matching plan)
 * - F: Formula errors (unknown function, unbound symbol, coercion)
 * - E: Execution errors (cancellation, stale step graph)
 * - X: External facade errors (retrieval, tool, agent)
 * - R: Runtime errors (file not found, invalid config)
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add error code enum value below
 * 2. Add description in getErrorDescription()
 * 3. Add exit code mapping in getExitCodeForError() if the category default is wrong
 * 4. Add a suggested action in getSuggestedAction()
 *
 * @module errors
 */

import { ExitCodes } from './ExitCodes.js';

export enum PlanErrorCode {
  // ============================================================================
  // SCHEMA ERRORS (S) - Structure problems
  // Exit Code: ExitCodes.INVALID_SCHEMA (103)
  // ============================================================================

  /** Malformed YAML/JSON syntax */
  SCHEMA_PARSE_ERROR = 'GP-S-001',

  /** Missing required field */
  SCHEMA_MISSING_FIELD = 'GP-S-002',

  /** Invalid field type */
  SCHEMA_INVALID_TYPE = 'GP-S-003',

  /** Step kind outside rag/tool/compute */
  SCHEMA_INVALID_KIND = 'GP-S-004',

  /** Two steps share an id */
  SCHEMA_DUPLICATE_ID = 'GP-S-005',

  /** Unknown field in plan definition */
  SCHEMA_UNKNOWN_FIELD = 'GP-S-006',

  /** Field value does not match expected format or bounds */
  SCHEMA_INVALID_FORMAT = 'GP-S-007',

  // ============================================================================
  // VALIDATION ERRORS (V) - The request cannot be honoured as given
  // Exit Code: ExitCodes.VALIDATION_FAILED (105)
  // ============================================================================

  /** Declared plan input not supplied */
  VALIDATION_MISSING_INPUT = 'GP-V-001',

  /** Strategy name not registered */
  VALIDATION_UNKNOWN_STRATEGY = 'GP-V-002',

  /** No plan matches the scenario */
  VALIDATION_PLAN_NOT_FOUND = 'GP-V-003',

  /** Tool name registered twice */
  VALIDATION_DUPLICATE_TOOL = 'GP-V-004',

  // ============================================================================
  // FORMULA ERRORS (F) - Compute step problems
  // Exit Code: ExitCodes.STEP_FAILED (201)
  // ============================================================================

  /** Formula references a symbol with no value */
  FORMULA_UNBOUND_SYMBOL = 'GP-F-001',

  /** Formula calls a function outside the supported set */
  FORMULA_UNKNOWN_FUNCTION = 'GP-F-002',

  /** Bound value is not coercible to a finite number */
  FORMULA_TYPE_COERCION = 'GP-F-003',

  /** Formula text is outside the grammar */
  FORMULA_SYNTAX = 'GP-F-004',

  // ============================================================================
  // EXECUTION ERRORS (E) - Run lifecycle
  // Exit Code: ExitCodes.EXECUTION_FAILED (200), ExitCodes.CANCELLED (130)
  // ============================================================================

  /** Execution cancelled through the abort signal */
  EXECUTION_CANCELLED = 'GP-E-001',

  /** Cached step graph belongs to a different plan body */
  EXECUTION_STALE_GRAPH = 'GP-E-002',

  // ============================================================================
  // EXTERNAL ERRORS (X) - Facade failures
  // Exit Code: ExitCodes.EXTERNAL_SERVICE_FAILED (202)
  // ============================================================================

  /** Retrieval facade reported a failure */
  EXTERNAL_RETRIEVAL_FAILED = 'GP-X-001',

  /** Tool facade reported a failure */
  EXTERNAL_TOOL_FAILED = 'GP-X-002',

  /** Agent facade reported a failure */
  EXTERNAL_AGENT_FAILED = 'GP-X-003',

  // ============================================================================
  // RUNTIME ERRORS (R) - System/Infrastructure
  // Exit Code: ExitCodes.INTERNAL_ERROR (250), ExitCodes.INVALID_FILE (110)
  // ============================================================================

  /** Plan file not found */
  RUNTIME_FILE_NOT_FOUND = 'GP-R-001',

  /** Engine configuration invalid */
  RUNTIME_INVALID_CONFIG = 'GP-R-002',

  /** Internal engine error (illegal state transition and the like) */
  RUNTIME_INTERNAL_ERROR = 'GP-R-003',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Stops the run or the command */
  ERROR = 'error',

  /** Logged, execution continues */
  WARNING = 'warning',
}

/**
 * Get human-readable category name from error code
 *
 * @example
 * ```typescript
 * getErrorCategory(PlanErrorCode.SCHEMA_UNKNOWN_FIELD); // "Schema Error"
 * ```
 */
export function getErrorCategory(code: PlanErrorCode): string {
  if (code.startsWith('GP-S-')) return 'Schema Error';
  if (code.startsWith('GP-V-')) return 'Validation Error';
  if (code.startsWith('GP-F-')) return 'Formula Error';
  if (code.startsWith('GP-E-')) return 'Execution Error';
  if (code.startsWith('GP-X-')) return 'External Error';
  if (code.startsWith('GP-R-')) return 'Runtime Error';
  return 'Unknown Error';
}

/**
 * Get detailed description for an error code
 */
export function getErrorDescription(code: PlanErrorCode): string {
  const descriptions: Record<PlanErrorCode, string> = {
    [PlanErrorCode.SCHEMA_PARSE_ERROR]: 'YAML/JSON syntax error prevents parsing. Check indentation, colons and brackets.',
    [PlanErrorCode.SCHEMA_MISSING_FIELD]: 'A required field is missing from the plan definition.',
    [PlanErrorCode.SCHEMA_INVALID_TYPE]: 'A field has the wrong type (e.g., string instead of list).',
    [PlanErrorCode.SCHEMA_INVALID_KIND]: 'A step type is not one of rag, tool or compute.',
    [PlanErrorCode.SCHEMA_DUPLICATE_ID]: 'Two or more steps have the same id. Each step id must be unique within a plan.',
    [PlanErrorCode.SCHEMA_UNKNOWN_FIELD]: 'The plan contains an unknown or misspelled field name.',
    [PlanErrorCode.SCHEMA_INVALID_FORMAT]: 'A field value does not match the expected format (id pattern, version, empty list).',

    [PlanErrorCode.VALIDATION_MISSING_INPUT]: 'One or more declared plan inputs were not supplied.',
    [PlanErrorCode.VALIDATION_UNKNOWN_STRATEGY]: 'The requested execution strategy is not registered.',
    [PlanErrorCode.VALIDATION_PLAN_NOT_FOUND]: 'No registered plan matches the scenario.',
    [PlanErrorCode.VALIDATION_DUPLICATE_TOOL]: 'A tool with the same name is already registered.',

    [PlanErrorCode.FORMULA_UNBOUND_SYMBOL]: 'A formula operand names a symbol that has no value in the variable table.',
    [PlanErrorCode.FORMULA_UNKNOWN_FUNCTION]: 'A formula calls a function outside min, max, sum and avg.',
    [PlanErrorCode.FORMULA_TYPE_COERCION]: 'A bound value cannot be read as a finite number.',
    [PlanErrorCode.FORMULA_SYNTAX]: 'A formula is not a single function call or a single operand.',

    [PlanErrorCode.EXECUTION_CANCELLED]: 'Execution was cancelled by the caller before it finished.',
    [PlanErrorCode.EXECUTION_STALE_GRAPH]: 'A different plan body was presented under a cached plan id.',

    [PlanErrorCode.EXTERNAL_RETRIEVAL_FAILED]: 'The retrieval service reported a failure.',
    [PlanErrorCode.EXTERNAL_TOOL_FAILED]: 'The tool service reported a failure.',
    [PlanErrorCode.EXTERNAL_AGENT_FAILED]: 'The agent reported a failure.',

    [PlanErrorCode.RUNTIME_FILE_NOT_FOUND]: 'The plan file does not exist at the given path.',
    [PlanErrorCode.RUNTIME_INVALID_CONFIG]: 'The engine configuration is invalid.',
    [PlanErrorCode.RUNTIME_INTERNAL_ERROR]: 'Internal engine error. This indicates a bug.',
  };

  return descriptions[code] ?? 'Unknown error occurred';
}

/**
 * Map an engine error code to a process exit code
 *
 * @example
 * ```typescript
 * getExitCodeForError(PlanErrorCode.SCHEMA_UNKNOWN_FIELD); // ExitCodes.INVALID_SCHEMA
 * ```
 */
export function getExitCodeForError(code: PlanErrorCode): ExitCodes {
  if (code.startsWith('GP-S-')) {
    if (code === PlanErrorCode.SCHEMA_PARSE_ERROR) {
      return ExitCodes.INVALID_FORMAT;
    }
    return ExitCodes.INVALID_SCHEMA;
  }

  if (code.startsWith('GP-V-')) {
    if (code === PlanErrorCode.VALIDATION_MISSING_INPUT) {
      return ExitCodes.MISSING_REQUIRED_INPUT;
    }
    return ExitCodes.VALIDATION_FAILED;
  }

  if (code.startsWith('GP-F-')) {
    return ExitCodes.STEP_FAILED;
  }

  if (code.startsWith('GP-E-')) {
    if (code === PlanErrorCode.EXECUTION_CANCELLED) {
      return ExitCodes.CANCELLED;
    }
    return ExitCodes.EXECUTION_FAILED;
  }

  if (code.startsWith('GP-X-')) {
    return ExitCodes.EXTERNAL_SERVICE_FAILED;
  }

  if (code === PlanErrorCode.RUNTIME_FILE_NOT_FOUND) {
    return ExitCodes.INVALID_FILE;
  }
  if (code === PlanErrorCode.RUNTIME_INVALID_CONFIG) {
    return ExitCodes.INVALID_CONFIG;
  }
  return ExitCodes.INTERNAL_ERROR;
}

/**
 * Check if an error code is fixable by changing the plan, the inputs
 * or the command line (as opposed to a service or engine fault)
 */
export function isUserError(code: PlanErrorCode): boolean {
  return (
    code.startsWith('GP-S-') ||
    code.startsWith('GP-V-') ||
    code.startsWith('GP-F-') ||
    code === PlanErrorCode.RUNTIME_FILE_NOT_FOUND ||
    code === PlanErrorCode.RUNTIME_INVALID_CONFIG
  );
}

/**
 * Check if an error might go away on retry.
 * The engine itself never retries; callers may.
 */
export function isRetryable(code: PlanErrorCode): boolean {
  return code.startsWith('GP-X-');
}

/**
 * Get suggested action for an error code
 */
export function getSuggestedAction(code: PlanErrorCode): string {
  const actions: Record<PlanErrorCode, string> = {
    [PlanErrorCode.SCHEMA_PARSE_ERROR]: 'Fix YAML/JSON syntax errors',
    [PlanErrorCode.SCHEMA_MISSING_FIELD]: 'Add the missing required field',
    [PlanErrorCode.SCHEMA_INVALID_TYPE]: 'Review field type requirements in the plan schema',
    [PlanErrorCode.SCHEMA_INVALID_KIND]: 'Use one of: rag, tool, compute',
    [PlanErrorCode.SCHEMA_DUPLICATE_ID]: 'Rename duplicate steps to have unique ids',
    [PlanErrorCode.SCHEMA_UNKNOWN_FIELD]: 'Check field names against the plan schema',
    [PlanErrorCode.SCHEMA_INVALID_FORMAT]: 'Correct the field format',

    [PlanErrorCode.VALIDATION_MISSING_INPUT]: 'Provide every input listed under plan_inputs',
    [PlanErrorCode.VALIDATION_UNKNOWN_STRATEGY]: 'Use a registered strategy name or register the strategy',
    [PlanErrorCode.VALIDATION_PLAN_NOT_FOUND]: 'Register a plan whose tags or title match the scenario, or set a fallback plan',
    [PlanErrorCode.VALIDATION_DUPLICATE_TOOL]: 'Use a different tool name or unregister the existing tool first',

    [PlanErrorCode.FORMULA_UNBOUND_SYMBOL]: 'Bind the symbol through an earlier step output or a plan input',
    [PlanErrorCode.FORMULA_UNKNOWN_FUNCTION]: 'Use min, max, sum or avg',
    [PlanErrorCode.FORMULA_TYPE_COERCION]: 'Make sure the bound value is a number or a numeric string',
    [PlanErrorCode.FORMULA_SYNTAX]: 'Write the formula as a single call such as min(a, b)',

    [PlanErrorCode.EXECUTION_CANCELLED]: 'Re-run the plan if the cancellation was not intended',
    [PlanErrorCode.EXECUTION_STALE_GRAPH]: 'Invalidate the cached plan before executing the new version',

    [PlanErrorCode.EXTERNAL_RETRIEVAL_FAILED]: 'Check the retrieval service and retry',
    [PlanErrorCode.EXTERNAL_TOOL_FAILED]: 'Check the tool name, its arguments and the tool service',
    [PlanErrorCode.EXTERNAL_AGENT_FAILED]: 'Check the agent service and retry',

    [PlanErrorCode.RUNTIME_FILE_NOT_FOUND]: 'Check the file path exists and is accessible',
    [PlanErrorCode.RUNTIME_INVALID_CONFIG]: 'Fix the configuration value named in the error',
    [PlanErrorCode.RUNTIME_INTERNAL_ERROR]: 'Report the bug with full error details',
  };

  return actions[code] ?? 'Review error details';
}
