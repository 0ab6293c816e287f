export * from './EngineEvents.js';
export * from './ExecutionEvents.js';
