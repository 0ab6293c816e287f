export * from './StateMachine.js';
export * from './ExecutionState.js';
