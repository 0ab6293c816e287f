export * from './ComplexityTypes.js';
export * from './ComplexityClassifier.js';
export * from './KeywordLexicon.js';
