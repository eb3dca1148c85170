export * from './@log/index.js';
export * from './address.js';
export * from './config.js';
export * from './ddns/index.js';
export * from './dns/index.js';
export * from './errors.js';
export * from './ip/index.js';
export * from './setup.js';
