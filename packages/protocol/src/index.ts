// @loadfile/protocol
// Shared types, container layout and configuration for load-file builds

export * from './types/index.js';
export * from './container/paths.js';
export * from './naming/sanitize.js';
export * from './timestamps.js';
export * from './validation/config.js';
export * from './logging.js';
export * from './errors.js';
export * from './validation/resolve.js';
