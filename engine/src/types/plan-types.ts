/**
 * Plan model
 *
 * A Plan is the validated, immutable form of a plan document.
 * Field names here are camelCase; the document uses snake_case and the
 * step type names rag/tool/compute (see parser/PlanSchema.ts).
 */

/**
 * Step kinds. The set is closed; every consumer switches exhaustively.
 */
export enum StepKind {
  RETRIEVE = 'retrieve',
  TOOL = 'tool',
  COMPUTE = 'compute',
}

/**
 * Declared variable: documentation and complexity analysis only.
 * `formula` is never evaluated.
 */
export interface Variable {
  readonly name: string;
  readonly symbol: string;
  readonly unit: string;
  readonly description?: string;
  readonly formula?: string;
}

/**
 * Step input: a literal, or a string containing `{symbol}` placeholders
 */
export type StepInputs = Readonly<Record<string, unknown>>;

interface StepBase {
  readonly id: string;
  readonly description: string;
  readonly inputs: StepInputs;
  /** Ordered symbols this step binds */
  readonly outputs: readonly string[];
}

export interface RetrieveStep extends StepBase {
  readonly kind: StepKind.RETRIEVE;
  readonly query: string;
}

export interface ToolStep extends StepBase {
  readonly kind: StepKind.TOOL;
  readonly toolName: string;
}

export interface ComputeStep extends StepBase {
  readonly kind: StepKind.COMPUTE;
  readonly formula: string;
}

export type PlanStep = RetrieveStep | ToolStep | ComputeStep;

export type StepOfKind<K extends StepKind> = Extract<PlanStep, { kind: K }>;

export interface PlanMetadata {
  readonly author?: string;
  readonly createdAt?: string;
  readonly updatedAt?: string;
  readonly tags: readonly string[];
}

export interface Plan {
  readonly planId: string;
  readonly title: string;
  readonly description: string;
  readonly version: string;
  readonly steps: readonly PlanStep[];
  readonly variables: readonly Variable[];
  /** Input name → description; every key is required at execution */
  readonly planInputs: Readonly<Record<string, string>>;
  readonly planOutputs: readonly string[];
  readonly metadata: PlanMetadata;
}

/**
 * Exhaustiveness guard for switches over closed unions
 */
export function assertNever(value: never, message = 'Unexpected value'): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}
