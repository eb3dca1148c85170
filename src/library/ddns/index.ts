export * from './ddns-provider.js';
export * from './providers/index.js';
export * from './reconciler.js';
export * from './scheduler.js';
