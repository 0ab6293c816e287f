export * from './FormulaParser.js';
export * from './FormulaEvaluator.js';
