// Export all domain models

export * from './types.js';
export * from './component.js';
export * from './change-spec.js';
export * from './impact.js';
export * from './contract.js';
