export * from './PlanLoader.js';
