export * from './TimeoutManager.js';
