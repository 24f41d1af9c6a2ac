// Main export file - re-exports all public APIs

export * from './core/index.js';
export * from './config/index.js';
export * from './http/index.js';
export * from './utils/errors.js';
export type { SecurityError, HeaderMap } from './types/index.js';
