export * from './types';
export * from './errors';
export { MemoryDocumentStore } from './memory/memory.store';
export { MongoDocumentStore } from './mongo.store';
