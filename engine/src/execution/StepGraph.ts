/**
 * Step Graph
 *
 * The compiled, linear form of a plan: steps in run order, each with the
 * symbols it reads and the earlier step that produces each of them.
 * Pure planning data; nothing here executes.
 *
 * Steps always run in declaration order. Producers are diagnostic: a
 * symbol with no producer is expected to come from the caller's inputs.
 *
 * @module execution
 */

import { createHash } from 'node:crypto';
import { PlaceholderResolver } from '../context/PlaceholderResolver.js';
import { StepKind, type Plan, type PlanStep } from '../types/plan-types.js';
import { deepFreeze } from '../utils/freeze.js';

export interface StepNode {
  readonly step: PlanStep;
  /** Zero-based position in the plan */
  readonly index: number;
  /** Symbols read through placeholders, in order of appearance */
  readonly reads: readonly string[];
  /** Symbol → id of the latest earlier step that outputs it */
  readonly producers: Readonly<Record<string, string>>;
}

export interface StepGraph {
  readonly planId: string;
  /** Content hash of the plan the graph was built from */
  readonly fingerprint: string;
  readonly nodes: readonly StepNode[];
}

/**
 * sha256 over the plan's JSON form
 */
export function planFingerprint(plan: Plan): string {
  return createHash('sha256').update(JSON.stringify(plan)).digest('hex');
}

function readsOf(step: PlanStep): string[] {
  const reads = PlaceholderResolver.symbolsInInputs(step.inputs);
  if (step.kind === StepKind.RETRIEVE) {
    for (const symbol of PlaceholderResolver.extractSymbols(step.query)) {
      if (!reads.includes(symbol)) reads.push(symbol);
    }
  }
  return reads;
}

/**
 * Compile a plan into a frozen step graph
 */
export function buildStepGraph(plan: Plan): StepGraph {
  const producedBy = new Map<string, string>();

  const nodes = plan.steps.map((step, index): StepNode => {
    const reads = readsOf(step);
    const producers: Record<string, string> = {};
    for (const symbol of reads) {
      const producer = producedBy.get(symbol);
      if (producer !== undefined) {
        producers[symbol] = producer;
      }
    }
    for (const symbol of step.outputs) {
      producedBy.set(symbol, step.id);
    }
    return { step, index, reads, producers };
  });

  return deepFreeze({
    planId: plan.planId,
    fingerprint: planFingerprint(plan),
    nodes,
  });
}
