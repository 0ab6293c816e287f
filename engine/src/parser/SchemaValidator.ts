/**
 * Schema Validator
 *
 * Validates a raw plan document (already parsed from YAML/JSON) against
 * PlanSchema, with typo detection for unknown fields and one structured
 * SchemaError per failure.
 *
 * @module parser
 */

import type { ZodIssue } from 'zod';
import { SchemaError, findClosestMatch } from '../errors/index.js';
import {
  PlanDocumentSchema,
  PLAN_FIELDS,
  STEP_FIELDS,
  VARIABLE_FIELDS,
  STEP_TYPES,
  KIND_FIELDS,
  type PlanDocument,
} from './PlanSchema.js';

export type SchemaValidationResult =
  | { success: true; data: PlanDocument }
  | { success: false; error: SchemaError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * `['steps', 0, 'query']` → `plan.steps[0].query`
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  let out = 'plan';
  for (const segment of path) {
    out += typeof segment === 'number' ? `[${segment}]` : `.${segment}`;
  }
  return out;
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

export class SchemaValidator {
  /**
   * Validate a raw plan document
   *
   * @returns The validated document with defaults applied
   * @throws SchemaError describing the first problem found
   */
  static validate(raw: unknown): PlanDocument {
    if (!isRecord(raw)) {
      throw SchemaError.invalidType('plan', 'object', describeType(raw), 'plan');
    }

    this.validateUnknownFields(raw, PLAN_FIELDS, 'plan');
    if (Array.isArray(raw.steps)) {
      raw.steps.forEach((step, index) => {
        if (isRecord(step)) {
          this.validateUnknownFields(step, STEP_FIELDS, `plan.steps[${index}]`);
        }
      });
    }
    if (Array.isArray(raw.variables)) {
      raw.variables.forEach((variable, index) => {
        if (isRecord(variable)) {
          this.validateUnknownFields(variable, VARIABLE_FIELDS, `plan.variables[${index}]`);
        }
      });
    }

    const parsed = PlanDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.transformIssue(parsed.error.issues[0], raw);
    }

    this.validateUniqueStepIds(parsed.data);
    return parsed.data;
  }

  /**
   * Validate without throwing
   */
  static safeParse(raw: unknown): SchemaValidationResult {
    try {
      return { success: true, data: this.validate(raw) };
    } catch (error) {
      if (error instanceof SchemaError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  static isValid(raw: unknown): boolean {
    return this.safeParse(raw).success;
  }

  private static validateUnknownFields(
    obj: Record<string, unknown>,
    allowed: readonly string[],
    path: string
  ): void {
    for (const field of Object.keys(obj)) {
      if (!allowed.includes(field)) {
        throw SchemaError.unknownField(field, `${path}.${field}`, findClosestMatch(field, allowed));
      }
    }
  }

  private static validateUniqueStepIds(document: PlanDocument): void {
    const seen = new Map<string, number>();
    document.steps.forEach((step, index) => {
      const first = seen.get(step.id);
      if (first !== undefined) {
        throw SchemaError.duplicateId(step.id, first, index);
      }
      seen.set(step.id, index);
    });
  }

  /**
   * Turn a zod issue into a SchemaError
   */
  private static transformIssue(issue: ZodIssue, raw: Record<string, unknown>): SchemaError {
    const path = formatPath(issue.path);
    const last = issue.path[issue.path.length - 1];
    const field = last === undefined ? 'plan' : String(last);

    switch (issue.code) {
      case 'invalid_type': {
        if (issue.received === 'undefined') {
          const kindField = this.kindFieldFor(issue.path, raw);
          if (kindField) {
            return SchemaError.missingKindField(kindField.stepId, kindField.kind, field, path);
          }
          return SchemaError.missingField(field, path.slice(0, path.length - field.length - 1) || 'plan');
        }
        return SchemaError.invalidType(field, issue.expected, issue.received, path);
      }

      case 'invalid_union_discriminator': {
        const kind = valueAt(raw, issue.path);
        if (kind === undefined) {
          return SchemaError.missingField('type', path.slice(0, path.length - '.type'.length));
        }
        return SchemaError.invalidKind(kind, STEP_TYPES, path);
      }

      default:
        return SchemaError.invalidFormat(field, issue.message, path);
    }
  }

  /**
   * When the missing field is the one a step kind requires, identify the step
   */
  private static kindFieldFor(
    issuePath: ReadonlyArray<string | number>,
    raw: Record<string, unknown>
  ): { stepId: string; kind: string } | undefined {
    if (issuePath.length !== 3 || issuePath[0] !== 'steps') {
      return undefined;
    }
    const step = valueAt(raw, issuePath.slice(0, 2));
    if (!isRecord(step)) {
      return undefined;
    }
    const kind = step.type;
    const missing = issuePath[2];
    const isKindField = STEP_TYPES.some((type) => type === kind && KIND_FIELDS[type] === missing);
    if (!isKindField || typeof kind !== 'string') {
      return undefined;
    }
    return { stepId: typeof step.id === 'string' ? step.id : `#${String(issuePath[1])}`, kind };
  }
}
