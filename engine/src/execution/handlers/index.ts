export * from './StepHandler.js';
export * from './RetrieveStepHandler.js';
export * from './ToolStepHandler.js';
export * from './ComputeStepHandler.js';
