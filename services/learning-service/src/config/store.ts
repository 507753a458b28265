import logger from '@eduhub/shared/config/logger';
import { MemoryDocumentStore, MongoDocumentStore, type DocumentStore } from '../store';
import type { LearningServiceConfig } from './env';
import { initMongo } from './mongo';

/**
 * Builds the document store selected by STORE_DRIVER and makes sure every
 * collection, validator and index exists.
 */
export async function createStore(config: LearningServiceConfig): Promise<DocumentStore> {
  let store: DocumentStore;
  if (config.STORE_DRIVER === 'memory') {
    store = new MemoryDocumentStore({ dbName: config.MONGO_DB_NAME });
  } else {
    const connection = await initMongo({ uri: config.MONGO_URI, dbName: config.MONGO_DB_NAME });
    store = new MongoDocumentStore(connection);
  }

  await store.ensureCollections();
  logger.info('Document store ready', { service: 'learning-service', driver: config.STORE_DRIVER, db: store.name });
  return store;
}
