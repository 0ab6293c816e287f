/**
 * Plan Parser
 *
 * Main entry point for turning plan documents into Plans.
 * Orchestrates text parsing, schema validation and the mapping from the
 * wire form to the model.
 *
 * @module parser
 */

import YAML from 'yaml';
import { SchemaError, errorMessage } from '../errors/index.js';
import { StepKind, assertNever, type Plan, type PlanStep } from '../types/plan-types.js';
import { deepFreeze } from '../utils/freeze.js';
import { SchemaValidator } from './SchemaValidator.js';
import type { PlanDocument, StepDocument } from './PlanSchema.js';

export class PlanParser {
  /**
   * Parse a plan from a raw object (already parsed YAML/JSON)
   *
   * @returns Deep-frozen Plan
   * @throws SchemaError
   */
  static parse(raw: unknown): Plan {
    const document = SchemaValidator.validate(raw);
    return deepFreeze(this.toPlan(document));
  }

  /**
   * Parse a plan from YAML text
   */
  static fromYAML(text: string): Plan {
    let raw: unknown;
    try {
      raw = YAML.parse(text);
    } catch (error) {
      throw SchemaError.parseError('YAML', errorMessage(error), error);
    }
    return this.parse(raw);
  }

  /**
   * Parse a plan from JSON text
   */
  static fromJSON(text: string): Plan {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw SchemaError.parseError('JSON', errorMessage(error), error);
    }
    return this.parse(raw);
  }

  /**
   * Parse text whose format is given by the file name; YAML otherwise
   * (YAML is a superset of JSON)
   */
  static fromContent(text: string, filename?: string): Plan {
    if (filename?.toLowerCase().endsWith('.json')) {
      return this.fromJSON(text);
    }
    return this.fromYAML(text);
  }

  private static toPlan(document: PlanDocument): Plan {
    return {
      planId: document.plan_id,
      title: document.title,
      description: document.description,
      version: document.version,
      steps: document.steps.map((step) => this.toStep(step)),
      variables: document.variables.map((variable) => ({ ...variable })),
      planInputs: { ...document.plan_inputs },
      planOutputs: [...document.plan_outputs],
      metadata: {
        author: document.author,
        createdAt: document.created_at,
        updatedAt: document.updated_at,
        tags: [...document.tags],
      },
    };
  }

  private static toStep(step: StepDocument): PlanStep {
    const common = {
      id: step.id,
      description: step.description,
      inputs: { ...step.inputs },
      outputs: [...step.outputs],
    };

    switch (step.type) {
      case 'rag':
        return { ...common, kind: StepKind.RETRIEVE, query: step.query };
      case 'tool':
        return { ...common, kind: StepKind.TOOL, toolName: step.tool_name };
      case 'compute':
        return { ...common, kind: StepKind.COMPUTE, formula: step.formula };
      default:
        return assertNever(step, 'Unknown step type');
    }
  }
}
