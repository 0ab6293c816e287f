export * from './PlanSchema.js';
export * from './SchemaValidator.js';
export * from './PlanParser.js';
