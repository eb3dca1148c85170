export * from './message.js';
export * from './server-url.js';
export * from './transport.js';
export * from './tsig.js';
