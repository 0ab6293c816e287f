/**
 * Step Graph Cache
 *
 * Caller-owned cache of compiled step graphs keyed by plan id. Published
 * graphs are frozen and shared by concurrent runs. A different plan body
 * presented under a cached id is an error; the cache never rebuilds
 * implicitly.
 *
 * @module execution
 */

import { StaleStepGraphError } from '../errors/ExecutionErrors.js';
import type { Plan } from '../types/plan-types.js';
import { buildStepGraph, planFingerprint, type StepGraph } from './StepGraph.js';

export class StepGraphCache {
  private readonly graphs = new Map<string, StepGraph>();

  /**
   * Cached graph for the plan, built on first use
   *
   * @throws StaleStepGraphError when the plan changed since it was cached
   */
  get(plan: Plan): StepGraph {
    const cached = this.graphs.get(plan.planId);
    if (!cached) {
      const graph = buildStepGraph(plan);
      this.graphs.set(plan.planId, graph);
      return graph;
    }

    const fingerprint = planFingerprint(plan);
    if (fingerprint !== cached.fingerprint) {
      throw new StaleStepGraphError(plan.planId, cached.fingerprint, fingerprint);
    }
    return cached;
  }

  has(planId: string): boolean {
    return this.graphs.has(planId);
  }

  /**
   * @returns true if a graph was dropped
   */
  invalidate(planId: string): boolean {
    return this.graphs.delete(planId);
  }

  clear(): void {
    this.graphs.clear();
  }

  get size(): number {
    return this.graphs.size;
  }
}
