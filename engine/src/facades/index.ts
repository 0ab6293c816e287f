export * from './FacadeTypes.js';
export * from './ToolRegistry.js';
export * from './TimeoutFacades.js';
