/**
 * Plan Catalog
 *
 * In-memory set of plans a scenario can be routed to. Each plan is
 * scored by how many of its terms (tags plus title words of two or more
 * characters) occur in the scenario text; the highest score wins and
 * ties keep registration order. A zero score falls back to the fallback
 * plan when one is set.
 *
 * @module catalog
 */

import { PlanNotFoundError } from '../errors/ValidationErrors.js';
import type { Plan } from '../types/plan-types.js';

export interface PlanMatch {
  plan: Plan;
  score: number;
  /** Terms found in the scenario */
  matched: string[];
  /** The fallback plan was chosen because nothing matched */
  fallback: boolean;
}

const WORD_SEPARATOR = /[^\p{L}\p{N}_]+/u;

/**
 * Lower-cased tags and title words used for matching, without duplicates
 */
export function planTerms(plan: Plan): string[] {
  const terms = [
    ...plan.metadata.tags,
    ...plan.title.split(WORD_SEPARATOR).filter((word) => word.length >= 2),
  ].map((term) => term.trim().toLowerCase());
  return [...new Set(terms.filter((term) => term.length > 0))];
}

export class PlanCatalog {
  private readonly plans = new Map<string, Plan>();
  private fallbackId: string | undefined;

  constructor(plans: Iterable<Plan> = []) {
    for (const plan of plans) {
      this.register(plan);
    }
  }

  /**
   * Add a plan; a plan with the same id is replaced in place
   */
  register(plan: Plan): this {
    this.plans.set(plan.planId, plan);
    return this;
  }

  get(planId: string): Plan | undefined {
    return this.plans.get(planId);
  }

  has(planId: string): boolean {
    return this.plans.has(planId);
  }

  list(): Plan[] {
    return [...this.plans.values()];
  }

  get size(): number {
    return this.plans.size;
  }

  remove(planId: string): boolean {
    if (this.fallbackId === planId) {
      this.fallbackId = undefined;
    }
    return this.plans.delete(planId);
  }

  /**
   * Plan used when no plan scores above zero. `undefined` clears it.
   *
   * @throws PlanNotFoundError when the id is not registered
   */
  setFallback(planId: string | undefined): void {
    if (planId !== undefined && !this.plans.has(planId)) {
      throw PlanNotFoundError.forId(planId);
    }
    this.fallbackId = planId;
  }

  get fallback(): string | undefined {
    return this.fallbackId;
  }

  /**
   * Best plan for a scenario, or undefined when nothing matches and no
   * fallback is set
   */
  select(scenario: string): PlanMatch | undefined {
    const text = scenario.toLowerCase();
    let best: PlanMatch | undefined;

    for (const plan of this.plans.values()) {
      const matched = planTerms(plan).filter((term) => text.includes(term));
      if (matched.length > 0 && (!best || matched.length > best.score)) {
        best = { plan, score: matched.length, matched, fallback: false };
      }
    }
    if (best) {
      return best;
    }

    const fallback = this.fallbackId === undefined ? undefined : this.plans.get(this.fallbackId);
    return fallback ? { plan: fallback, score: 0, matched: [], fallback: true } : undefined;
  }
}
