export * from './product.js';
export * from './payloads.js';
export * from './listing.js';
