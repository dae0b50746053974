// Export all services

export * from './graph/index.js';
export * from './impact/index.js';
export * from './structure/index.js';
export * from './contracts/index.js';
export * from './serialization/index.js';
export * from './config/index.js';
