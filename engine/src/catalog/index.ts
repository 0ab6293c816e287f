export * from './PlanCatalog.js';
