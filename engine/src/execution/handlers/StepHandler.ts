import type { VariableTable } from '../../context/VariableTable.js';
import type { EngineLogger } from '../../logging/EngineLogger.js';
import type { StepKind, StepOfKind } from '../../types/plan-types.js';

/**
 * What a handler sees of the run
 */
export interface StepContext {
  readonly executionId: string;
  readonly variables: VariableTable;
  readonly logger: EngineLogger;
}

/**
 * Symbols a step binds and their values
 */
export type StepOutputs = Record<string, unknown>;

/**
 * Runs one kind of step. Handlers read the variable table but never
 * write it; the strategy binds the returned outputs.
 */
export interface StepHandler<K extends StepKind> {
  readonly kind: K;
  execute(step: StepOfKind<K>, context: StepContext): Promise<StepOutputs>;
}

/**
 * One handler per step kind; adding a kind without a handler fails to compile
 */
export type StepHandlerMap = { readonly [K in StepKind]: StepHandler<K> };
