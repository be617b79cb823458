// @loadfile/container
// Container storage: writer abstractions and ZIP packaging

export * from './types.js';
export * from './fs.js';
export * from './errors.js';
export * from './pack.js';
