/**
 * Plan document schema
 *
 * Describes the wire form of a plan (YAML or JSON). Field names are
 * snake_case and step kinds are `rag`, `tool` and `compute`; PlanParser
 * maps the validated document to the camelCase Plan model.
 *
 * @module parser
 */

import { z } from 'zod';

export const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const IdSchema = z.string().regex(ID_PATTERN, { message: 'must contain only letters, digits, "_" and "-"' });

export const VariableSchema = z.object({
  name: z.string(),
  symbol: z.string().min(1),
  unit: z.string(),
  description: z.string().optional(),
  formula: z.string().optional(),
});

const stepShape = {
  id: IdSchema,
  description: z.string().min(1),
  inputs: z.record(z.string(), z.unknown()).default({}),
  outputs: z.array(z.string()),
};

export const RetrieveStepSchema = z.object({
  ...stepShape,
  type: z.literal('rag'),
  query: z.string(),
});

export const ToolStepSchema = z.object({
  ...stepShape,
  type: z.literal('tool'),
  tool_name: z.string().min(1),
});

export const ComputeStepSchema = z.object({
  ...stepShape,
  type: z.literal('compute'),
  formula: z.string().min(1),
});

export const StepSchema = z.discriminatedUnion('type', [RetrieveStepSchema, ToolStepSchema, ComputeStepSchema]);

export const PlanDocumentSchema = z.object({
  plan_id: IdSchema,
  title: z.string().min(1).max(200),
  description: z.string().max(1000),
  version: z.string().regex(/^\d+\.\d+(\.\d+)?$/, { message: 'must look like "1.0" or "1.0.2"' }).default('1.0'),
  variables: z.array(VariableSchema).default([]),
  steps: z.array(StepSchema).min(1, { message: 'must contain at least one step' }),
  plan_inputs: z.record(z.string(), z.string()).default({}),
  plan_outputs: z.array(z.string()).default([]),
  author: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export type PlanDocument = z.output<typeof PlanDocumentSchema>;
export type StepDocument = z.output<typeof StepSchema>;

/**
 * Wire step type names, in the order they are reported
 */
export const STEP_TYPES = ['rag', 'tool', 'compute'] as const;

/**
 * Fields allowed at each level; anything else is an unknown field
 */
export const PLAN_FIELDS: readonly string[] = Object.keys(PlanDocumentSchema.shape);
export const STEP_FIELDS: readonly string[] = ['id', 'type', 'description', 'inputs', 'outputs', 'query', 'tool_name', 'formula'];
export const VARIABLE_FIELDS: readonly string[] = Object.keys(VariableSchema.shape);

/**
 * The field each step type requires in addition to the common ones
 */
export const KIND_FIELDS: Readonly<Record<(typeof STEP_TYPES)[number], string>> = {
  rag: 'query',
  tool: 'tool_name',
  compute: 'formula',
};
