export * from './StepGraph.js';
export * from './StepGraphCache.js';
export * from './StepExecutor.js';
export * from './ExecutionStrategyRouter.js';
export * from './handlers/index.js';
export * from './strategies/index.js';
