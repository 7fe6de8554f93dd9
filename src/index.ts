// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
