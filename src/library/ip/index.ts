export * from './ip-resolver.js';
export * from './ip-source.js';
