export * from './errors.js';
export * from './parser.js';
export * from './client.js';
export * from './availability.js';
