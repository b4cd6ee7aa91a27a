export * from './errors.js';
export * from './types.js';
export { LocalFileSystemListingStore, type LocalFileSystemListingStoreOptions } from './local-file-system.js';
export { InMemoryListingStore } from './in-memory.js';
