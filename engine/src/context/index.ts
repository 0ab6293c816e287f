export * from './VariableTable.js';
export * from './PlaceholderResolver.js';
