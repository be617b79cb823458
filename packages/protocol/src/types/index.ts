// Re-export all protocol types

export * from './common.js';
export * from './fields.js';
export * from './entries.js';
export * from './manifest.js';
