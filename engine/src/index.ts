/**
 * GridPlan Engine - plan execution for operational scenarios
 *
 * @example
 * ```ts
 * import { PlanEngine, ToolRegistry } from '@gridplan/engine';
 *
 * const engine = new PlanEngine({ tools: new ToolRegistry(), retrieval });
 * const plan = await engine.loadPlanFile('./plans/dc-limit.yaml');
 * const result = await engine.execute(plan, 'LineB tripped', {});
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { PlanEngine } from './core/PlanEngine.js';
export type { PlanEngineOptions } from './core/PlanEngine.js';
export * from './core/EngineConfig.js';

// ============================================================================
// TYPES
// ============================================================================

export * from './types/plan-types.js';
export * from './types/execution-types.js';
export * from './types/log-types.js';

// ============================================================================
// ADVANCED - Building blocks for custom wiring
// ============================================================================

// Parser and loader
export * from './parser/index.js';
export * from './loader/index.js';

// Analysis and routing
export * from './analysis/index.js';
export * from './execution/index.js';
export * from './catalog/index.js';

// Facades
export * from './facades/index.js';

// Formula, context and state
export * from './formula/index.js';
export * from './context/index.js';
export * from './state/index.js';

// Events and logging
export * from './events/index.js';
export * from './logging/EngineLogger.js';
export * from './logging/LoggerManager.js';

// Automation policies
export * from './automation/index.js';

// Errors (for error handling)
export * from './errors/index.js';

export { deepFreeze } from './utils/freeze.js';
