export * from './ExecutionStrategy.js';
export * from './SequentialStrategy.js';
export * from './DelegatedStrategy.js';
export * from './StrategyRegistry.js';
