/**
 * Plan Schema Errors
 *
 * Errors raised while turning a raw plan document into a Plan.
 * Use the factory methods rather than the constructor:
 *
 * ```typescript
 * throw SchemaError.unknownField('plan_inptus', 'plan', 'plan_inputs');
 * ```
 *
 * @module errors
 */

import { PlanEngineError, type PlanEngineErrorDiagnostic } from './PlanEngineError.js';
import { PlanErrorCode } from './ErrorCodes.js';

type SchemaErrorDiagnostic = Omit<PlanEngineErrorDiagnostic, 'severity' | 'exitCode'>;

/**
 * Schema validation error (structure problems)
 *
 * Used for:
 * - YAML/JSON syntax errors
 * - Missing required fields, including kind-specific step fields
 * - Invalid field types and formats
 * - Unknown step kinds
 * - Duplicate step ids
 * - Unknown/misspelled fields
 */
export class SchemaError extends PlanEngineError {
  constructor(diagnostic: SchemaErrorDiagnostic) {
    super(diagnostic);
  }

  /**
   * Document text could not be parsed as YAML/JSON
   */
  static parseError(format: 'YAML' | 'JSON', detail: string, cause?: unknown): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_PARSE_ERROR,
      message: `Failed to parse plan ${format}: ${detail}`,
      path: 'plan',
      context: { format },
      cause,
    });
  }

  static missingField(field: string, path: string): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_MISSING_FIELD,
      message: `Missing required field "${field}"`,
      path,
      hint: `Add "${field}" to ${path}`,
      context: { field },
    });
  }

  /**
   * A step of `kind` lacks the field that kind requires (query, tool_name, formula)
   */
  static missingKindField(stepId: string, kind: string, field: string, path: string): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_MISSING_FIELD,
      message: `Step "${stepId}" of type "${kind}" is missing required field "${field}"`,
      path,
      hint: `Steps of type "${kind}" must declare "${field}"`,
      context: { stepId, kind, field },
    });
  }

  static invalidType(field: string, expected: string, received: string, path: string): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_INVALID_TYPE,
      message: `Field "${field}" has incorrect type: expected ${expected}, received ${received}`,
      path,
      hint: `Change the value of "${field}" to a ${expected}`,
      context: { field, expected, received },
    });
  }

  static invalidKind(kind: unknown, allowed: readonly string[], path: string): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_INVALID_KIND,
      message: `Unknown step type ${JSON.stringify(kind)}`,
      path,
      hint: `Use one of: ${allowed.join(', ')}`,
      context: { kind, allowed },
    });
  }

  static duplicateId(stepId: string, firstIndex: number, secondIndex: number): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_DUPLICATE_ID,
      message: `Duplicate step id "${stepId}" (steps[${firstIndex}] and steps[${secondIndex}])`,
      path: `plan.steps[${secondIndex}].id`,
      hint: 'Rename one of the steps so every step id is unique',
      context: { stepId, firstIndex, secondIndex },
    });
  }

  /**
   * Unknown field, with a "did you mean" hint when a close match exists
   */
  static unknownField(field: string, path: string, suggestion?: string): SchemaError {
    const hint = suggestion
      ? `Did you mean "${suggestion}"? Check for typos in field names.`
      : 'Remove the field or check the plan schema for valid field names.';

    return new SchemaError({
      code: PlanErrorCode.SCHEMA_UNKNOWN_FIELD,
      message: `Unknown field "${field}" in plan definition`,
      path,
      hint,
      context: { field, suggestion },
    });
  }

  static invalidFormat(field: string, detail: string, path: string): SchemaError {
    return new SchemaError({
      code: PlanErrorCode.SCHEMA_INVALID_FORMAT,
      message: `Field "${field}" is invalid: ${detail}`,
      path,
      context: { field },
    });
  }
}

/**
 * Plan file does not exist or cannot be read
 */
export class PlanFileNotFoundError extends PlanEngineError {
  constructor(public readonly filePath: string, cause?: unknown) {
    super({
      code: PlanErrorCode.RUNTIME_FILE_NOT_FOUND,
      message: `Plan file not found: ${filePath}`,
      path: filePath,
      context: { filePath },
      cause,
    });
  }
}
