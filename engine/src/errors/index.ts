/**
 * Plan Engine Error Infrastructure
 *
 * @module errors
 */

export * from './ExitCodes.js';
export * from './ErrorCodes.js';
export * from './PlanEngineError.js';
export * from './SchemaError.js';
export * from './ValidationErrors.js';
export * from './FormulaErrors.js';
export * from './FacadeErrors.js';
export * from './ExecutionErrors.js';
export * from './TypoDetector.js';
export * from './ErrorFormatter.js';
